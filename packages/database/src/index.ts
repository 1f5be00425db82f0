/**
 * @remedyops/database
 * Database layer and repositories
 */

export { initializeDatabase, getDatabase, closeDatabase } from './connection.js';
export type { DatabaseConnection, DatabaseConfig } from './connection.js';

export * from './schema.js';
export * from './repositories/index.js';
