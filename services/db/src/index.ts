export * from './schema.js';
export { createDb, closeDb, needsSsl } from './connection.js';
export { installExtensions, pushSchema } from './setup.js';
export type { Database, ConnectionOptions } from './connection.js';
export {
  eq,
  and,
  asc,
  lte,
  inArray,
  isNotNull,
  sql,
  cosineDistance,
} from 'drizzle-orm';
