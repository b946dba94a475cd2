export { createDatabase, closeDatabase } from './client.js';
export type { Database, DatabaseOptions } from './client.js';
export { listings } from './schema.js';
export type { ListingStateRow } from './schema.js';
