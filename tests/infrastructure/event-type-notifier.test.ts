import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  publishEventTypeChange,
  EVENT_TYPE_CHANNEL,
} from '../../src/infrastructure/redis/event-type-notifier.js';
import type { Publisher } from '../../src/infrastructure/redis/event-type-notifier.js';

function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

describe('publishEventTypeChange', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('publishes a JSON payload on the change channel', async () => {
    const publish = vi.fn().mockResolvedValue(1);
    const redis: Publisher = { publish };

    await publishEventTypeChange(redis, log, 'update', 'order.created', '1.1.0');

    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish.mock.calls[0]?.[0]).toBe(EVENT_TYPE_CHANNEL);
    const payload: unknown = JSON.parse(String(publish.mock.calls[0]?.[1]));
    expect(payload).toEqual({
      ts: expect.any(String),
      reason: 'update',
      name: 'order.created',
      version: '1.1.0',
    });
    expect(log.debug).toHaveBeenCalledWith(
      { channel: 'event_types_changed', reason: 'update', name: 'order.created', version: '1.1.0' },
      'Published event type change notification',
    );
  });

  it('logs and swallows publish failures', async () => {
    const failure = new Error('connection refused');
    const redis: Publisher = { publish: vi.fn().mockRejectedValue(failure) };

    await expect(publishEventTypeChange(redis, log, 'create', 'order.created', '1.0.0')).resolves.toBeUndefined();

    expect(log.error).toHaveBeenCalledWith(
      { err: failure, reason: 'create', name: 'order.created', version: '1.0.0' },
      'Failed to publish event type change notification',
    );
  });
});
