import fs from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import dotenv from 'dotenv';
import { createDatabase, type Database } from './pool.js';
import { defaultLogger } from '../services/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const logger = defaultLogger.child({ component: 'migrate' });

async function createMigrationsTable(db: Database): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      executed_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);
}

async function getExecutedMigrations(db: Database): Promise<string[]> {
  const result = await db.query<{ name: string }>('SELECT name FROM migrations ORDER BY id');
  return result.rows.map(row => row.name);
}

async function runMigration(db: Database, name: string, sql: string): Promise<void> {
  logger.info('Running migration', { name });
  await db.transaction(async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  });
  logger.info('Completed migration', { name });
}

export async function migrate(db: Database, migrationsDir = path.join(__dirname, 'migrations')): Promise<string[]> {
  await createMigrationsTable(db);
  const executedMigrations = await getExecutedMigrations(db);

  const migrationFiles = fs.readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const applied: string[] = [];
  for (const file of migrationFiles) {
    if (!executedMigrations.includes(file)) {
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await runMigration(db, file, sql);
      applied.push(file);
    }
  }

  logger.info('All migrations completed successfully', { applied: applied.length });
  return applied;
}

async function main(): Promise<void> {
  dotenv.config();
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }
  const db = createDatabase(databaseUrl, logger);
  try {
    await migrate(db);
  } finally {
    await db.close();
  }
}

// Run migrations when executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
