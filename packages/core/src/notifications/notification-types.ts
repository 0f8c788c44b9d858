/**
 * Notification Domain Types
 */

import type { NotificationType } from '@payflow/database';

export interface CreateNotificationParams {
  userId: string;
  title: string;
  message: string;
  type?: NotificationType;
  link?: string | null;
  metadata?: Record<string, unknown>;
}

export interface ListNotificationsParams {
  unreadOnly: boolean;
  limit: number;
  offset: number;
}

export interface NotificationView {
  id: string;
  title: string;
  message: string;
  type: NotificationType;
  link: string | null;
  metadata: Record<string, unknown>;
  isRead: boolean;
  readAt: string | null;
  createdAt: string;
}

export interface NotificationPage {
  items: NotificationView[];
  total: number;
  unread: number;
  limit: number;
  offset: number;
}
