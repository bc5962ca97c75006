/**
 * NotificationDispatcher - fire-and-forget notification delivery
 *
 * `notify` hands the event to the sink and returns immediately. Failed
 * deliveries are logged and kept in a bounded dead-letter list; they never
 * reach the caller.
 *
 * @module packages/adapters/notifications/NotificationDispatcher
 */

import type { Logger } from 'pino';
import type { EntitlementNotification } from '../../core/domain/notification.js';
import type { INotificationSink, INotifier } from '../../core/ports/INotifier.js';
import { errorMessage } from '../../core/errors.js';

export interface DeadLetter {
  event: EntitlementNotification;
  error: string;
  failedAt: Date;
}

export interface NotificationDispatcherOptions {
  /** Dead letters retained in memory (default: 100) */
  maxDeadLetters?: number;
}

export class NotificationDispatcher implements INotifier {
  private readonly log: Logger;
  private readonly maxDeadLetters: number;
  private readonly inflight = new Set<Promise<void>>();
  private readonly deadLetters: DeadLetter[] = [];
  private delivered = 0;
  private deadLettered = 0;

  constructor(
    private readonly sink: INotificationSink,
    logger: Logger,
    options: NotificationDispatcherOptions = {}
  ) {
    this.log = logger.child({ component: 'NotificationDispatcher' });
    this.maxDeadLetters = options.maxDeadLetters ?? 100;
  }

  notify(event: EntitlementNotification): void {
    const delivery = this.deliver(event);
    this.inflight.add(delivery);
    void delivery.then(() => {
      this.inflight.delete(delivery);
    });
  }

  /** Waits for every delivery started so far */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  getDeadLetters(): readonly DeadLetter[] {
    return this.deadLetters;
  }

  getStats(): { delivered: number; deadLettered: number; pending: number } {
    return {
      delivered: this.delivered,
      deadLettered: this.deadLettered,
      pending: this.inflight.size,
    };
  }

  private async deliver(event: EntitlementNotification): Promise<void> {
    try {
      await this.sink.deliver(event);
      this.delivered++;
    } catch (error) {
      const message = errorMessage(error);
      this.log.warn(
        { accountId: event.accountId, tierName: event.tierName, kind: event.kind, error: message },
        'Notification dead-lettered'
      );
      this.deadLettered++;
      this.deadLetters.push({ event, error: message, failedAt: new Date() });
      if (this.deadLetters.length > this.maxDeadLetters) {
        this.deadLetters.shift();
      }
    }
  }
}
