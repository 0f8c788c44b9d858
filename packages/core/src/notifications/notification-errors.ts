/**
 * Notification Domain Errors
 */

import { ForbiddenError, NotFoundError } from '../errors.js';

export class NotificationNotFoundError extends NotFoundError {
  constructor(notificationId: string) {
    super(`Notification not found: ${notificationId}`);
  }
}

export class NotificationAccessDeniedError extends ForbiddenError {
  constructor() {
    super('You do not have access to this notification');
  }
}
