import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * We mock the infrastructure/db barrel for event-type repository functions.
 */
vi.mock('../../src/infrastructure/db/index.js', () => ({
  insertEventType: vi.fn(),
  findAllEventTypes: vi.fn(),
  findEventTypeByName: vi.fn(),
  updateEventType: vi.fn(),
  findSchemaVersions: vi.fn(),
}));

import {
  registerEventType,
  evolveEventType,
  getEventType,
  listEventTypes,
  listSchemaVersions,
} from '../../src/application/event-type-registry.js';
import { SchemaEvolutionService } from '../../src/application/schema-evolution.js';
import type { EventType } from '../../src/domain/index.js';

import {
  insertEventType,
  findAllEventTypes,
  findEventTypeByName,
  updateEventType,
  findSchemaVersions,
} from '../../src/infrastructure/db/index.js';
import { FIXED_NOW, makeEventType, propose } from '../helpers.js';

const mockInsertEventType = vi.mocked(insertEventType);
const mockFindAllEventTypes = vi.mocked(findAllEventTypes);
const mockFindEventTypeByName = vi.mocked(findEventTypeByName);
const mockUpdateEventType = vi.mocked(updateEventType);
const mockFindSchemaVersions = vi.mocked(findSchemaVersions);

const db = {} as Parameters<typeof registerEventType>[0];
const service = new SchemaEvolutionService({ now: () => FIXED_NOW });
const NOW_ISO = FIXED_NOW.toISOString();

beforeEach(() => {
  vi.clearAllMocks();
});

// ── registerEventType ───────────────────────────────────────

describe('registerEventType', () => {
  it('should insert the event type at version 1.0.0', async () => {
    const proposed = propose(makeEventType({ name: 'order.created' }));
    mockInsertEventType.mockImplementation(async (_db, eventType) => eventType);

    const result = await registerEventType(db, proposed, () => FIXED_NOW);

    expect(result.status).toBe('ok');
    const inserted = mockInsertEventType.mock.calls[0]?.[1];
    expect(inserted?.schema.version).toBe('1.0.0');
    expect(inserted?.schema.created_at).toBe(NOW_ISO);
    expect(inserted?.created_at).toBe(NOW_ISO);
    expect(inserted?.updated_at).toBe(NOW_ISO);
  });

  it('should report a name that already exists as a conflict', async () => {
    mockInsertEventType.mockResolvedValue(null);

    const result = await registerEventType(db, propose(makeEventType()), () => FIXED_NOW);

    expect(result).toEqual({ status: 'conflict' });
  });

  it('should refuse a schema the meta-schema rejects without touching the database', async () => {
    const proposed = propose(makeEventType(), { schema: { type: 'object', not: {} } });

    const result = await registerEventType(db, proposed);

    expect(result).toEqual({
      status: 'invalid_schema',
      incompatibilities: [{ jsonPath: '#/not', message: 'the keyword "not" is not supported' }],
    });
    expect(mockInsertEventType).not.toHaveBeenCalled();
  });
});

// ── evolveEventType ─────────────────────────────────────────

describe('evolveEventType', () => {
  it('should return not_found for an unknown name', async () => {
    mockFindEventTypeByName.mockResolvedValue(undefined);

    const result = await evolveEventType(db, service, 'missing', propose(makeEventType()));

    expect(result).toEqual({ status: 'not_found' });
    expect(mockUpdateEventType).not.toHaveBeenCalled();
  });

  it('should persist an accepted evolution', async () => {
    const original = makeEventType({ name: 'order.created' });
    mockFindEventTypeByName.mockResolvedValue(original);
    mockUpdateEventType.mockImplementation(async (_db, eventType) => eventType);
    const proposed = propose(original, {
      schema: { type: 'object', properties: { order_id: { type: 'string' }, amount: { type: 'number' }, note: {} }, required: ['order_id'] },
    });

    const result = await evolveEventType(db, service, 'order.created', proposed);

    expect(result.status).toBe('ok');
    const saved: EventType | undefined = mockUpdateEventType.mock.calls[0]?.[1];
    expect(saved?.schema.version).toBe('1.1.0');
    expect(saved?.updated_at).toBe(NOW_ISO);
  });

  it('should report a rejected evolution without writing', async () => {
    const original = makeEventType({ name: 'order.created' });
    mockFindEventTypeByName.mockResolvedValue(original);

    const result = await evolveEventType(db, service, 'order.created', propose(original, { name: 'order.placed' }));

    expect(result.status).toBe('invalid_evolution');
    if (result.status === 'invalid_evolution') {
      expect(result.error.message).toBe('changing name is not allowed ("order.created" -> "order.placed")');
    }
    expect(mockUpdateEventType).not.toHaveBeenCalled();
  });

  it('should refuse a schema the meta-schema rejects', async () => {
    const original = makeEventType({ name: 'order.created' });
    mockFindEventTypeByName.mockResolvedValue(original);

    const result = await evolveEventType(db, service, 'order.created', propose(original, { schema: '[' }));

    expect(result.status).toBe('invalid_schema');
    expect(mockUpdateEventType).not.toHaveBeenCalled();
  });

  it('should propagate unexpected errors', async () => {
    const original = makeEventType({ name: 'order.created' });
    mockFindEventTypeByName.mockResolvedValue(original);
    const failing = new SchemaEvolutionService({
      schemaDiff: { collectChanges: () => { throw new Error('boom'); } },
    });

    await expect(evolveEventType(db, failing, 'order.created', propose(original))).rejects.toThrow('boom');
  });

  it('should update only the revision the change was computed from', async () => {
    const original = makeEventType({ name: 'order.created', updated_at: '2026-02-01T08:30:00.000Z' });
    mockFindEventTypeByName.mockResolvedValue(original);
    mockUpdateEventType.mockImplementation(async (_db, eventType) => eventType);

    await evolveEventType(db, service, 'order.created', propose(original));

    expect(mockUpdateEventType.mock.calls[0]?.[2]).toEqual({
      version: '1.0.0',
      updatedAt: '2026-02-01T08:30:00.000Z',
    });
  });

  it('should report a concurrent update when the stored row changed in between', async () => {
    const original = makeEventType({ name: 'order.created' });
    mockFindEventTypeByName.mockResolvedValue(original);
    mockUpdateEventType.mockResolvedValue(undefined);

    const result = await evolveEventType(db, service, 'order.created', propose(original));

    expect(result).toEqual({ status: 'concurrent_update' });
  });
});

// ── queries ─────────────────────────────────────────────────

describe('getEventType', () => {
  it('should return the event type', async () => {
    const eventType = makeEventType();
    mockFindEventTypeByName.mockResolvedValue(eventType);

    expect(await getEventType(db, eventType.name)).toBe(eventType);
  });

  it('should return null when not found', async () => {
    mockFindEventTypeByName.mockResolvedValue(undefined);

    expect(await getEventType(db, 'missing')).toBeNull();
  });
});

describe('listEventTypes', () => {
  it('should return all event types', async () => {
    const rows = [makeEventType(), makeEventType()];
    mockFindAllEventTypes.mockResolvedValue(rows);

    expect(await listEventTypes(db)).toEqual(rows);
  });
});

describe('listSchemaVersions', () => {
  it('should return the schema history', async () => {
    const eventType = makeEventType();
    mockFindEventTypeByName.mockResolvedValue(eventType);
    mockFindSchemaVersions.mockResolvedValue([eventType.schema]);

    expect(await listSchemaVersions(db, eventType.name)).toEqual([eventType.schema]);
    expect(mockFindSchemaVersions).toHaveBeenCalledWith(db, eventType.name);
  });

  it('should return null for an unknown event type', async () => {
    mockFindEventTypeByName.mockResolvedValue(undefined);

    expect(await listSchemaVersions(db, 'missing')).toBeNull();
    expect(mockFindSchemaVersions).not.toHaveBeenCalled();
  });
});
