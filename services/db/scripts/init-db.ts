#!/usr/bin/env npx tsx
/**
 * Prepare a PostgreSQL database for the pipeline
 *
 * Usage:
 *   npx tsx scripts/init-db.ts            # create extension, then push schema
 *   npx tsx scripts/init-db.ts --no-push  # only create the pgvector extension
 *
 * Environment variables (in .env):
 *   DATABASE_URL - Target database connection string
 */

import * as dotenv from 'dotenv';
import { installExtensions, pushSchema } from '../src/setup.js';

dotenv.config();

async function main() {
  const dbUrl = process.env.DATABASE_URL;
  if (!dbUrl) {
    console.error('❌ DATABASE_URL environment variable is not set');
    process.exit(1);
  }

  await installExtensions(dbUrl);
  if (!process.argv.includes('--no-push')) {
    pushSchema();
  }
  console.log('\n✅ Database ready');
}

main().catch((error) => {
  console.error('❌ Database initialization failed:', error);
  process.exit(1);
});
