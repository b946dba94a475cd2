import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DatabaseOptions {
  /** Pool size. A harvest run issues one statement at a time. */
  maxConnections?: number;
  connectTimeoutSeconds?: number;
}

export type Database = ReturnType<typeof createDatabase>;

export function createDatabase(connectionString: string, options: DatabaseOptions = {}) {
  const client = postgres(connectionString, {
    max: options.maxConnections ?? 2,
    connect_timeout: options.connectTimeoutSeconds ?? 30,
  });
  return drizzle({ client, schema });
}

export async function closeDatabase(db: Database): Promise<void> {
  await db.$client.end();
}
