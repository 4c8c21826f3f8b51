export { redisPlugin, publishEventTypeChange, EVENT_TYPE_CHANNEL } from './redis/index.js';
export type { EventTypeChangeReason, EventTypeChangePayload, Publisher } from './redis/index.js';
export {
  createDbClient,
  ensureTables,
  eventTypes,
  eventTypeSchemas,
  dbPlugin,
  insertEventType,
  findAllEventTypes,
  findEventTypeByName,
  updateEventType,
  findSchemaVersions,
} from './db/index.js';
export type { Database, DbClient, DbClientOptions, EventTypeRow, ExpectedRevision } from './db/index.js';
export { loadServerConfig, ConfigError } from './config.js';
export type { ServerConfig } from './config.js';
