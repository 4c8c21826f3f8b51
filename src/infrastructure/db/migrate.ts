import type { DbClient } from './client.js';

type Sql = DbClient['sql'];

/**
 * Lightweight migration via raw SQL.
 *
 * In production this is handled by drizzle-kit; for local dev this
 * guarantees the tables are present on first run.
 */
export async function ensureTables(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_types (
      name                  VARCHAR(255) PRIMARY KEY,
      owning_application    VARCHAR(255) NOT NULL,
      category              VARCHAR(20)  NOT NULL,
      enrichment_strategies JSONB        NOT NULL DEFAULT '[]',
      partition_strategy    VARCHAR(20)  NOT NULL,
      partition_key_fields  JSONB        NOT NULL DEFAULT '[]',
      compatibility_mode    VARCHAR(20)  NOT NULL,
      schema_type           VARCHAR(20)  NOT NULL,
      schema                TEXT         NOT NULL,
      schema_version        VARCHAR(32)  NOT NULL,
      schema_created_at     TIMESTAMPTZ  NOT NULL,
      created_at            TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at            TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_type_schemas (
      name        VARCHAR(255) NOT NULL,
      version     VARCHAR(32)  NOT NULL,
      schema_type VARCHAR(20)  NOT NULL,
      schema      TEXT         NOT NULL,
      created_at  TIMESTAMPTZ  NOT NULL,
      PRIMARY KEY (name, version)
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_types_owning_application ON event_types (owning_application)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_types_category ON event_types (category)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_type_schemas_created_at ON event_type_schemas (created_at)`);
}
