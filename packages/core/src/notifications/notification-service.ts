/**
 * Notification Service
 *
 * In-app notifications for the owning user.
 */

import type { Notification } from '@payflow/database';
import {
  NotificationAccessDeniedError,
  NotificationNotFoundError,
} from './notification-errors.js';
import type { NotificationRepository } from './notification-repository.js';
import type {
  CreateNotificationParams,
  ListNotificationsParams,
  NotificationPage,
  NotificationView,
} from './notification-types.js';

export function presentNotification(notification: Notification): NotificationView {
  return {
    id: notification.id,
    title: notification.title,
    message: notification.message,
    type: notification.type,
    link: notification.link,
    metadata: notification.metadata,
    isRead: notification.isRead,
    readAt: notification.readAt ? notification.readAt.toISOString() : null,
    createdAt: notification.createdAt.toISOString(),
  };
}

export class NotificationService {
  constructor(private notificationRepo: NotificationRepository) {}

  async notify(params: CreateNotificationParams): Promise<NotificationView> {
    const created = await this.notificationRepo.create(params);
    return presentNotification(created);
  }

  async listNotifications(
    userId: string,
    params: ListNotificationsParams
  ): Promise<NotificationPage> {
    const [page, unread] = await Promise.all([
      this.notificationRepo.listByUser(userId, params),
      this.notificationRepo.countUnread(userId),
    ]);

    return {
      items: page.items.map(presentNotification),
      total: page.total,
      unread,
      limit: params.limit,
      offset: params.offset,
    };
  }

  async unreadCount(userId: string): Promise<number> {
    return this.notificationRepo.countUnread(userId);
  }

  async markRead(userId: string, notificationId: string): Promise<NotificationView> {
    const existing = await this.requireOwned(userId, notificationId);
    if (existing.isRead) {
      return presentNotification(existing);
    }

    const updated = await this.notificationRepo.markRead(notificationId);
    if (!updated) {
      throw new NotificationNotFoundError(notificationId);
    }
    return presentNotification(updated);
  }

  async markAllRead(userId: string): Promise<{ updated: number }> {
    return { updated: await this.notificationRepo.markAllRead(userId) };
  }

  async deleteNotification(userId: string, notificationId: string): Promise<void> {
    await this.requireOwned(userId, notificationId);
    const deleted = await this.notificationRepo.delete(notificationId);
    if (!deleted) {
      throw new NotificationNotFoundError(notificationId);
    }
  }

  async clearRead(userId: string): Promise<{ deleted: number }> {
    return { deleted: await this.notificationRepo.deleteRead(userId) };
  }

  private async requireOwned(userId: string, notificationId: string): Promise<Notification> {
    const notification = await this.notificationRepo.findById(notificationId);
    if (!notification) {
      throw new NotificationNotFoundError(notificationId);
    }
    if (notification.userId !== userId) {
      throw new NotificationAccessDeniedError();
    }
    return notification;
  }
}
