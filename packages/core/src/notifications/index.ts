/**
 * Notifications Domain
 */

export { DrizzleNotificationRepository } from './notification-repository.js';
export type { NotificationRepository } from './notification-repository.js';

export { NotificationService, presentNotification } from './notification-service.js';
export {
  LOW_BALANCE_THRESHOLD_MINOR,
  NotificationDispatcher,
} from './notification-dispatcher.js';
export type { NotificationDispatcherDeps } from './notification-dispatcher.js';

export type {
  CreateNotificationParams,
  ListNotificationsParams,
  NotificationPage,
  NotificationView,
} from './notification-types.js';

export {
  NotificationAccessDeniedError,
  NotificationNotFoundError,
} from './notification-errors.js';
