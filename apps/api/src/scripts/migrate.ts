/**
 * Applies src/db/schema.sql to DATABASE_URL. Idempotent.
 *
 *   npm run migrate --workspace apps/api
 */

import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { loadConfig, loadEnvFile } from '../lib/config';

function findSchemaFile(): string {
  const candidates = [
    path.join(__dirname, '..', 'db', 'schema.sql'),
    // compiled output does not carry the .sql file
    path.join(__dirname, '..', '..', '..', '..', '..', 'apps', 'api', 'src', 'db', 'schema.sql'),
    path.join(process.cwd(), 'src', 'db', 'schema.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const schemaPath = findSchemaFile();
  const sql = fs.readFileSync(schemaPath, 'utf8');

  const pool = new Pool({ connectionString: config.databaseUrl });
  try {
    await pool.query(sql);
    console.log(`[migrate] applied ${schemaPath}`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('[migrate] failed', err);
  process.exit(1);
});
