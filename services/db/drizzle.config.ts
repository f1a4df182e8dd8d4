/// <reference types="node" />
import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { defineConfig } from 'drizzle-kit';
import { needsSsl } from './src/connection.js';

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error('DATABASE_URL environment variable is required');
}

// drizzle-kit only honours `ssl` with structured credentials, not with `url`
const target = new URL(databaseUrl);
const packageDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  schema: join(packageDir, 'src/schema.ts'),
  out: join(packageDir, 'migrations'),
  dialect: 'postgresql',
  // Leave tables owned by other applications in a shared database alone
  tablesFilter: ['documents', 'chunks'],
  dbCredentials: {
    host: target.hostname,
    port: target.port ? Number(target.port) : 5432,
    user: decodeURIComponent(target.username),
    password: decodeURIComponent(target.password),
    database: target.pathname.replace(/^\//, ''),
    ssl: needsSsl(databaseUrl) ? { rejectUnauthorized: false } : false,
  },
});
