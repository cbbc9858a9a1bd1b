/**
 * Notification Dispatcher.
 *
 * Delivers a run's result to the caller's callback URL via HTTP POST, in the
 * background. Each delivery is tracked as a NotificationRecord and retried on
 * transient failures. Includes an HMAC signature for payload verification when
 * a signing secret is configured.
 *
 * Nothing thrown during delivery escapes the dispatcher: exhausted or rejected
 * deliveries are marked `failed` and logged.
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { NotificationPayload, NotificationRecord } from '../domain/notification';
import { RetryPolicy } from '../engine/retry';
import { Logger, logger as rootLogger } from '../logger';
import { validatePublicUrl } from '../security/url-guard';

export interface NotificationDeliveryRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/** Notification delivery function type (injectable for testing). */
export type NotificationDeliveryFn = (request: NotificationDeliveryRequest) => Promise<{ statusCode: number }>;

export interface NotificationDispatcherOptions {
  retryPolicy: RetryPolicy;
  /** Per-attempt timeout. */
  timeoutMs: number;
  signingSecret?: string;
  /** Skip the loopback/private/metadata URL check. */
  allowPrivateCallbacks?: boolean;
  deliveryFn?: NotificationDeliveryFn;
  logger?: Logger;
  /** Settled records kept in the delivery log. */
  maxLogEntries?: number;
}

const DEFAULT_MAX_LOG_ENTRIES = 100;

/** A non-2xx response from the callback endpoint. */
export class DeliveryRejectedError extends Error {
  constructor(readonly statusCode: number) {
    super(`Callback returned HTTP ${statusCode}`);
    this.name = 'DeliveryRejectedError';
  }

  /** 408, 429 and 5xx are worth another attempt; everything else is final. */
  get retryable(): boolean {
    return this.statusCode === 408 || this.statusCode === 429 || this.statusCode >= 500;
  }
}

/** HTTP delivery using native fetch with a per-attempt abort timeout. */
export const httpDelivery: NotificationDeliveryFn = async ({ url, body, headers, timeoutMs }) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body,
      signal: controller.signal,
    });
    return { statusCode: response.status };
  } finally {
    clearTimeout(timeout);
  }
};

export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

export class NotificationDispatcher {
  private readonly deliveryFn: NotificationDeliveryFn;
  private readonly retryPolicy: RetryPolicy;
  private readonly log: Logger;
  private readonly maxLogEntries: number;
  /** Records still being delivered, by id. */
  private readonly active = new Map<string, NotificationRecord>();
  /** Settled records, oldest first. */
  private deliveryLog: NotificationRecord[] = [];
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: NotificationDispatcherOptions) {
    this.deliveryFn = options.deliveryFn ?? httpDelivery;
    this.retryPolicy = options.retryPolicy.with({
      isRetryable: (error) => !(error instanceof DeliveryRejectedError) || error.retryable,
    });
    this.log = (options.logger ?? rootLogger).child({ component: 'notifications' });
    this.maxLogEntries = options.maxLogEntries ?? DEFAULT_MAX_LOG_ENTRIES;
  }

  /** Schedule a delivery and return immediately. */
  deliver(callbackUrl: string, payload: NotificationPayload, nonce: string): void {
    const record: NotificationRecord = {
      id: `ntf_${uuid()}`,
      callbackUrl,
      payload,
      nonce,
      attempts: 0,
      status: 'pending',
      createdAt: new Date().toISOString(),
    };
    this.active.set(record.id, record);

    const task: Promise<void> = this.run(record)
      .catch((error: unknown) => {
        this.settle(record, 'failed', error instanceof Error ? error.message : String(error));
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /** Resolves once every scheduled delivery has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /** Deliveries not yet settled. */
  getPending(): NotificationRecord[] {
    return [...this.active.values()].map((r) => ({ ...r }));
  }

  /** Settled deliveries, oldest first (for testing/audit). */
  getDeliveryLog(): NotificationRecord[] {
    return this.deliveryLog.map((r) => ({ ...r }));
  }

  private async run(record: NotificationRecord): Promise<void> {
    if (!this.options.allowPrivateCallbacks) {
      // SSRF protection: validate URL before making any request
      const urlError = validatePublicUrl(record.callbackUrl);
      if (urlError) {
        this.settle(record, 'failed', urlError);
        return;
      }
    }

    const body = JSON.stringify(record.payload);
    const baseHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'pagewright-notifier/0.1.0',
      'X-Notification-Id': record.id,
      'X-Notification-Nonce': record.nonce,
    };
    if (this.options.signingSecret) {
      baseHeaders['X-Notification-Signature'] = signPayload(body, this.options.signingSecret);
    }

    try {
      const statusCode = await this.retryPolicy.execute(
        async (attempt) => {
          record.attempts = attempt;
          record.nextRetryAt = undefined;
          const { statusCode } = await this.deliveryFn({
            url: record.callbackUrl,
            body,
            headers: { ...baseHeaders, 'X-Notification-Attempt': String(attempt) },
            timeoutMs: this.options.timeoutMs,
          });
          record.lastStatusCode = statusCode;
          if (statusCode < 200 || statusCode >= 300) {
            throw new DeliveryRejectedError(statusCode);
          }
          return statusCode;
        },
        {
          onRetry: ({ attempt, delayMs, error }) => {
            record.lastError = describe(error);
            record.nextRetryAt = new Date(Date.now() + delayMs).toISOString();
            this.log.warn('Notification attempt failed, retrying', {
              notificationId: record.id,
              task: record.payload.task,
              attempt,
              delayMs,
              error: record.lastError,
            });
          },
        },
      );
      record.lastStatusCode = statusCode;
      this.settle(record, 'delivered');
    } catch (error) {
      this.settle(record, 'failed', describe(error));
    }
  }

  private settle(record: NotificationRecord, status: 'delivered' | 'failed', error?: string): void {
    if (!this.active.has(record.id)) return;
    this.active.delete(record.id);

    record.status = status;
    record.nextRetryAt = undefined;
    record.settledAt = new Date().toISOString();
    if (error !== undefined) record.lastError = error;

    const context = {
      notificationId: record.id,
      task: record.payload.task,
      round: record.payload.round,
      attempts: record.attempts,
      statusCode: record.lastStatusCode,
    };
    if (status === 'delivered') {
      this.log.info('Notification delivered', context);
    } else {
      this.log.error('Notification failed', { ...context, error: record.lastError });
    }

    this.deliveryLog.push(record);
    if (this.deliveryLog.length > this.maxLogEntries) {
      this.deliveryLog = this.deliveryLog.slice(-this.maxLogEntries);
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'AbortError' ? 'Callback request timed out' : error.message;
  }
  return String(error);
}
