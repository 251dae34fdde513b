/**
 * Satori Telegram — Webhook Delivery
 *
 * Pushes every Satori event to the configured webhook URLs as
 * `{ op: 0, body: event }`. Delivery failures are logged per URL.
 */

import type { WebhookConfig } from '../config/types.js';
import type { SatoriEvent } from '../satori/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Webhooks');

/** Satori signalling opcode for an event. */
export const EVENT_OPCODE = 0;

const DELIVERY_TIMEOUT_MS = 10_000;

export interface WebhookPayload {
  op: typeof EVENT_OPCODE;
  body: SatoriEvent;
}

export interface DeliveryOutcome {
  url: string;
  ok: boolean;
  status?: number;
  error?: string;
}

export class WebhookDispatcher {
  constructor(private readonly webhooks: readonly WebhookConfig[]) {}

  get size(): number {
    return this.webhooks.length;
  }

  /**
   * Deliver one event to every webhook concurrently. Never rejects; the
   * outcome of each delivery is returned in configuration order.
   */
  async dispatch(event: SatoriEvent): Promise<DeliveryOutcome[]> {
    const payload: WebhookPayload = { op: EVENT_OPCODE, body: event };
    const body = JSON.stringify(payload);

    return Promise.all(this.webhooks.map((webhook) => deliver(webhook, body, event)));
  }
}

async function deliver(
  webhook: WebhookConfig,
  body: string,
  event: SatoriEvent
): Promise<DeliveryOutcome> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (webhook.token) {
    headers.Authorization = `Bearer ${webhook.token}`;
  }

  try {
    const response = await fetch(webhook.url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
    });
    // The reply is ignored; release the connection.
    await response.body?.cancel();

    if (!response.ok) {
      log.warn('Webhook rejected event', {
        url: webhook.url,
        status: response.status,
        eventId: event.id,
      });
      return { url: webhook.url, ok: false, status: response.status };
    }

    log.debug('Webhook delivered', { url: webhook.url, eventId: event.id, type: event.type });
    return { url: webhook.url, ok: true, status: response.status };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn('Webhook delivery failed', { url: webhook.url, eventId: event.id, error: message });
    return { url: webhook.url, ok: false, error: message };
  }
}
