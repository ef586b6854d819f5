export { createDatabase, closeDatabase } from './client.js';
export type { Database, DatabaseOptions } from './client.js';
export { books } from './schema.js';
export type { BookRow, NewBookRow } from './schema.js';
