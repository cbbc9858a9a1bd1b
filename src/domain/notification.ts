/**
 * Notification records, one per pipeline run that reached a terminal state.
 */

import { BoundaryResponse } from './pipeline';

export type NotificationStatus = 'pending' | 'delivered' | 'failed';

/** Body POSTed to the caller's callback URL. */
export type NotificationPayload = BoundaryResponse & {
  email: string;
  task: string;
  round: number;
  nonce: string;
};

export interface NotificationRecord {
  id: string;
  callbackUrl: string;
  payload: NotificationPayload;
  nonce: string;
  attempts: number;
  /** When the next attempt is due, while a retry is pending. */
  nextRetryAt?: string;
  status: NotificationStatus;
  lastStatusCode?: number;
  lastError?: string;
  createdAt: string;
  settledAt?: string;
}
