/**
 * Notification Repository
 */

import {
  notifications,
  type DatabaseOrTransaction,
  type Notification,
} from '@payflow/database';
import { and, count, desc, eq } from 'drizzle-orm';
import { isValidUuid } from '../users/user-repository.js';
import type { CreateNotificationParams, ListNotificationsParams } from './notification-types.js';

export interface NotificationRepository {
  create(params: CreateNotificationParams): Promise<Notification>;
  findById(notificationId: string): Promise<Notification | null>;
  listByUser(
    userId: string,
    params: ListNotificationsParams
  ): Promise<{ items: Notification[]; total: number }>;
  countUnread(userId: string): Promise<number>;
  markRead(notificationId: string): Promise<Notification | null>;
  /** @returns number of notifications changed */
  markAllRead(userId: string): Promise<number>;
  delete(notificationId: string): Promise<boolean>;
  /** @returns number of notifications removed */
  deleteRead(userId: string): Promise<number>;
}

export class DrizzleNotificationRepository implements NotificationRepository {
  constructor(private db: DatabaseOrTransaction) {}

  async create(params: CreateNotificationParams): Promise<Notification> {
    const [row] = await this.db
      .insert(notifications)
      .values({
        userId: params.userId,
        title: params.title,
        message: params.message,
        type: params.type ?? 'info',
        link: params.link ?? null,
        metadata: params.metadata ?? {},
      })
      .returning();
    if (!row) {
      throw new Error('Notification insert returned no row');
    }
    return row;
  }

  async findById(notificationId: string): Promise<Notification | null> {
    if (!isValidUuid(notificationId)) {
      return null;
    }
    const [row] = await this.db
      .select()
      .from(notifications)
      .where(eq(notifications.id, notificationId))
      .limit(1);
    return row ?? null;
  }

  async listByUser(
    userId: string,
    params: ListNotificationsParams
  ): Promise<{ items: Notification[]; total: number }> {
    const where = params.unreadOnly
      ? and(eq(notifications.userId, userId), eq(notifications.isRead, false))
      : eq(notifications.userId, userId);

    const [items, [totals]] = await Promise.all([
      this.db
        .select()
        .from(notifications)
        .where(where)
        .orderBy(desc(notifications.createdAt), desc(notifications.id))
        .limit(params.limit)
        .offset(params.offset),
      this.db.select({ total: count() }).from(notifications).where(where),
    ]);

    return { items, total: totals?.total ?? 0 };
  }

  async countUnread(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(notifications)
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)));
    return row?.total ?? 0;
  }

  async markRead(notificationId: string): Promise<Notification | null> {
    const [row] = await this.db
      .update(notifications)
      .set({ isRead: true, readAt: new Date() })
      .where(eq(notifications.id, notificationId))
      .returning();
    return row ?? null;
  }

  async markAllRead(userId: string): Promise<number> {
    const rows = await this.db
      .update(notifications)
      .set({ isRead: true, readAt: new Date() })
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)))
      .returning({ id: notifications.id });
    return rows.length;
  }

  async delete(notificationId: string): Promise<boolean> {
    const rows = await this.db
      .delete(notifications)
      .where(eq(notifications.id, notificationId))
      .returning({ id: notifications.id });
    return rows.length > 0;
  }

  async deleteRead(userId: string): Promise<number> {
    const rows = await this.db
      .delete(notifications)
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, true)))
      .returning({ id: notifications.id });
    return rows.length;
  }
}
