import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';

export const EVENT_TYPE_CHANNEL = 'event_types_changed';

export type EventTypeChangeReason = 'create' | 'update';

export interface EventTypeChangePayload {
  ts: string;
  reason: EventTypeChangeReason;
  name: string;
  version: string;
}

/** Anything that can publish to a Pub/Sub channel. */
export type Publisher = Pick<Redis, 'publish'>;

/**
 * Publishes a lightweight notification to the "event_types_changed"
 * Pub/Sub channel so publishers and consumers can reload the schema.
 *
 * Best-effort: publish failures are logged but never propagated to the caller.
 * Registry HTTP responses are never affected by Pub/Sub issues.
 */
export async function publishEventTypeChange(
  redis: Publisher,
  log: BaseLogger,
  reason: EventTypeChangeReason,
  name: string,
  version: string,
): Promise<void> {
  try {
    const payload: EventTypeChangePayload = {
      ts: new Date().toISOString(),
      reason,
      name,
      version,
    };
    await redis.publish(EVENT_TYPE_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: EVENT_TYPE_CHANNEL, reason, name, version }, 'Published event type change notification');
  } catch (err: unknown) {
    log.error({ err, reason, name, version }, 'Failed to publish event type change notification');
  }
}
