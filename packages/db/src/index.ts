import { readFile } from 'node:fs/promises';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  client: postgres.Sql;
}

/** Pooled connection for pipeline queries. */
export function createDatabase(connectionString: string): DatabaseConnection {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => {}, // IF NOT EXISTS notices on every ensureSchema
  });
  return { db: drizzle(client, { schema }), client };
}

const ensureSchemaFile = new URL('../sql/ensure-schema.sql', import.meta.url);

/**
 * Create every relation the pipeline owns, if missing.
 * Raw relations are created too so a fresh database can be seeded.
 */
export async function ensureSchema(client: postgres.Sql): Promise<void> {
  const ddl = await readFile(ensureSchemaFile, 'utf8');
  await client.unsafe(ddl);
}

export { schema };
