import { TimestampMs } from "@media-inspector/core";

export interface Notification {
  readonly message: string;
  readonly createdAt: TimestampMs;
  readonly ttlMs: number;
}

export function createNotification(message: string, createdAt: TimestampMs, ttlMs: number): Notification {
  return { message, createdAt, ttlMs };
}

export function isNotificationExpired(notification: Notification, now: TimestampMs): boolean {
  return now - notification.createdAt >= notification.ttlMs;
}
