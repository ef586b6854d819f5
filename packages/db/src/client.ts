import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DatabaseOptions {
  maxConnections?: number;
}

export type Database = ReturnType<typeof createDatabase>;

export function createDatabase(connectionString: string, options: DatabaseOptions = {}) {
  const client = postgres(connectionString, { max: options.maxConnections ?? 10 });
  return drizzle({ client, schema });
}

export async function closeDatabase(db: Database): Promise<void> {
  await db.$client.end();
}
