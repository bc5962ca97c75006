import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JobScheduler } from '../../../src/packages/jobs/reconciliation/JobScheduler.js';
import { createMockLogger } from '../../helpers/index.js';

describe('JobScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run on start and then on every interval until stopped', async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const scheduler = new JobScheduler({ name: 'sweep', run }, 1000, createMockLogger());

    scheduler.start();
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(3);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should wait for the first interval when runOnStart is off', async () => {
    const run = vi.fn().mockResolvedValue(undefined);
    const scheduler = new JobScheduler({ name: 'sweep', run }, 1000, createMockLogger(), {
      runOnStart: false,
    });

    scheduler.start();
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(1);
    await scheduler.stop();
  });

  it('should skip ticks while a run is in flight', async () => {
    let finish: () => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const scheduler = new JobScheduler({ name: 'sweep', run }, 1000, createMockLogger());

    scheduler.start();
    await vi.advanceTimersByTimeAsync(2000);

    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.getSkippedCount()).toBe(2);
    expect(scheduler.isRunning()).toBe(true);

    finish();
    await scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });

  it('should log failures and keep the schedule', async () => {
    const logger = createMockLogger();
    const run = vi.fn().mockRejectedValue(new Error('database is locked'));
    const scheduler = new JobScheduler({ name: 'sweep', run }, 1000, logger);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(run).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith({ error: 'database is locked' }, 'Scheduled job failed');
    await scheduler.stop();
  });
});
