import { execSync } from 'node:child_process';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { needsSsl } from './connection.js';

/**
 * Install the pgvector extension used by the chunks.embedding column
 */
export async function installExtensions(dbUrl: string): Promise<void> {
  console.log('\n🔌 Installing PostgreSQL extensions...');

  const client = new pg.Client({
    connectionString: dbUrl,
    ssl: needsSsl(dbUrl) ? { rejectUnauthorized: false } : undefined,
  });

  try {
    await client.connect();
    await client.query('CREATE EXTENSION IF NOT EXISTS vector');
    console.log('   ✅ pgvector extension installed');
  } finally {
    await client.end();
  }
}

/**
 * Create tables and indexes with drizzle-kit push, run from the package root
 * so drizzle.config.ts is picked up
 */
export function pushSchema(): void {
  console.log('\n📐 Running drizzle-kit push to create schema...');

  const dbDir = join(dirname(fileURLToPath(import.meta.url)), '..');
  try {
    execSync('npx drizzle-kit push', {
      cwd: dbDir,
      stdio: 'inherit',
      env: process.env,
    });
    console.log('   ✅ Schema created successfully');
  } catch (error) {
    console.error('   ❌ Failed to run drizzle-kit push');
    throw error;
  }
}
