import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';
import { defineConfig } from 'drizzle-kit';

const repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

// .env.local overrides .env; both are optional.
for (const [file, override] of [
  ['.env', false],
  ['.env.local', true],
] as const) {
  const path = resolve(repoRoot, file);
  if (existsSync(path)) {
    config({ path, override });
  }
}

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error('DATABASE_URL environment variable is required for drizzle-kit');
}

export default defineConfig({
  out: './drizzle',
  schema: './src/schema.ts',
  dialect: 'postgresql',
  dbCredentials: {
    url: databaseUrl,
  },
});
