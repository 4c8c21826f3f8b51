export { eventTypes, eventTypeSchemas } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions } from './client.js';
export { ensureTables } from './migrate.js';
export {
  insertEventType,
  findAllEventTypes,
  findEventTypeByName,
  updateEventType,
  findSchemaVersions,
} from './event-type-repository.js';
export type { EventTypeRow, ExpectedRevision } from './event-type-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
