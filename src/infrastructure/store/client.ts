import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management and the
 * bootstrap DDL) and the typed `db` instance (for queries).
 * `max: 1` makes the pool a single serialized connection.
 */
export function createDbClient(databaseUrl: string, options: { max: number } = { max: 1 }) {
  const sql = postgres(databaseUrl, {
    max: options.max,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];

/**
 * Ensures the records table exists (lightweight migration via raw SQL).
 * drizzle-kit can generate the same DDL from schema.ts for managed deploys.
 */
export async function ensureRegistrySchema(sql: DbClient['sql']): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS registry_records (
      seq          BIGSERIAL PRIMARY KEY,
      collection   VARCHAR(64)  NOT NULL,
      record_id    VARCHAR(255) NOT NULL,
      data         JSONB        NOT NULL,
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS uq_registry_records_collection_id ON registry_records (collection, record_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_registry_records_collection_seq ON registry_records (collection, seq)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_registry_records_data ON registry_records USING GIN (data jsonb_path_ops)`);
}
