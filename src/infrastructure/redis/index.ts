export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishEventTypeChange, EVENT_TYPE_CHANNEL } from './event-type-notifier.js';
export type { EventTypeChangeReason, EventTypeChangePayload, Publisher } from './event-type-notifier.js';
