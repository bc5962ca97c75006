export {
  NotificationDispatcher,
  type DeadLetter,
  type NotificationDispatcherOptions,
} from './NotificationDispatcher.js';
