import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { closeDatabase, createDatabase } from './client.js';

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const db = createDatabase(databaseUrl, { maxConnections: 1 });

  try {
    const currentDir = dirname(fileURLToPath(import.meta.url));
    await migrate(db, { migrationsFolder: join(currentDir, '../drizzle') });
    console.log('migrations applied successfully');
  } finally {
    await closeDatabase(db);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
