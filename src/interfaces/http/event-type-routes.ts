import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  eventTypeBodySchema,
  schemaValidationBodySchema,
} from '../../application/event-type-schema.js';
import {
  registerEventType,
  evolveEventType,
  getEventType,
  listEventTypes,
  listSchemaVersions,
} from '../../application/event-type-registry.js';
import type { RegistryOutcome } from '../../application/event-type-registry.js';
import { collectTextIncompatibilities, META_SCHEMA_VERSION } from '../../application/meta-schema.js';
import type { SchemaEvolutionService } from '../../application/schema-evolution.js';
import type { EventType } from '../../domain/index.js';
import { assertNever } from '../../domain/index.js';
import { publishEventTypeChange } from '../../infrastructure/redis/index.js';
import type { EventTypeChangeReason, Publisher } from '../../infrastructure/redis/index.js';

export interface EventTypeRoutesOptions {
  service: SchemaEvolutionService;
  /** Target for change notifications; null disables them. */
  publisher: Publisher | null;
}

type NameParams = { Params: { name: string } };

/** Maps a registry outcome to its HTTP response. */
function sendOutcome(
  reply: FastifyReply,
  name: string,
  outcome: RegistryOutcome<EventType>,
  successStatus: 200 | 201,
): FastifyReply {
  switch (outcome.status) {
    case 'ok':
      return reply.status(successStatus).send(outcome.value);
    case 'not_found':
      return reply.status(404).send({ error: 'Event type not found' });
    case 'conflict':
      return reply.status(409).send({ error: `Event type "${name}" already exists` });
    case 'concurrent_update':
      return reply.status(409).send({ error: `Event type "${name}" was changed by another request; retry the update` });
    case 'invalid_schema':
      return reply.status(422).send({
        error: 'Invalid schema',
        incompatibilities: outcome.incompatibilities,
      });
    case 'invalid_evolution':
      return reply.status(422).send({
        error: 'Invalid event type',
        detail: outcome.error.message,
        reasons: outcome.error.reasons,
      });
    default:
      return assertNever(outcome);
  }
}

/**
 * Event-type registry routes.
 *
 * POST /api/v1/event-types                register an event type
 * GET  /api/v1/event-types                list all event types
 * GET  /api/v1/event-types/:name          get single event type
 * PUT  /api/v1/event-types/:name          evolve an event type
 * GET  /api/v1/event-types/:name/schemas  schema history, newest first
 * POST /api/v1/schemas/validate           meta-schema check only
 */
async function eventTypeRoutes(fastify: FastifyInstance, opts: EventTypeRoutesOptions): Promise<void> {
  const { service, publisher } = opts;

  async function notify(reason: EventTypeChangeReason, eventType: EventType): Promise<void> {
    if (publisher !== null) {
      await publishEventTypeChange(publisher, fastify.log, reason, eventType.name, eventType.schema.version);
    }
  }

  // ── POST /api/v1/event-types ─────────────────────────────
  fastify.post(
    '/api/v1/event-types',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = eventTypeBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const outcome = await registerEventType(fastify.db, parsed.data);
      if (outcome.status === 'ok') {
        request.log.info(
          { name: outcome.value.name, version: outcome.value.schema.version },
          'Event type registered',
        );
        await notify('create', outcome.value);
      }

      return sendOutcome(reply, parsed.data.name, outcome, 201);
    },
  );

  // ── GET /api/v1/event-types ──────────────────────────────
  fastify.get(
    '/api/v1/event-types',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listEventTypes(fastify.db);
      return reply.status(200).send(rows);
    },
  );

  // ── GET /api/v1/event-types/:name ────────────────────────
  fastify.get(
    '/api/v1/event-types/:name',
    async (request: FastifyRequest<NameParams>, reply: FastifyReply) => {
      const row = await getEventType(fastify.db, request.params.name);
      if (row === null) {
        return reply.status(404).send({ error: 'Event type not found' });
      }
      return reply.status(200).send(row);
    },
  );

  // ── PUT /api/v1/event-types/:name ────────────────────────
  fastify.put(
    '/api/v1/event-types/:name',
    async (request: FastifyRequest<NameParams & { Body: unknown }>, reply: FastifyReply) => {
      const { name } = request.params;

      const parsed = eventTypeBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const outcome = await evolveEventType(fastify.db, service, name, parsed.data);
      if (outcome.status === 'ok') {
        request.log.info(
          { name, version: outcome.value.schema.version },
          'Event type evolved',
        );
        await notify('update', outcome.value);
      } else if (outcome.status === 'invalid_evolution') {
        request.log.warn({ name, reasons: outcome.error.reasons }, 'Event type evolution rejected');
      }

      return sendOutcome(reply, name, outcome, 200);
    },
  );

  // ── GET /api/v1/event-types/:name/schemas ────────────────
  fastify.get(
    '/api/v1/event-types/:name/schemas',
    async (request: FastifyRequest<NameParams>, reply: FastifyReply) => {
      const schemas = await listSchemaVersions(fastify.db, request.params.name);
      if (schemas === null) {
        return reply.status(404).send({ error: 'Event type not found' });
      }
      return reply.status(200).send(schemas);
    },
  );

  // ── POST /api/v1/schemas/validate ────────────────────────
  fastify.post(
    '/api/v1/schemas/validate',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = schemaValidationBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      return reply.status(200).send({
        meta_schema_version: META_SCHEMA_VERSION,
        incompatibilities: collectTextIncompatibilities(parsed.data.schema),
      });
    },
  );
}

export default fp(eventTypeRoutes, {
  name: 'event-type-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
