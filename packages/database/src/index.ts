export { loadDatabaseConfig, getDatabaseUrl } from './config.js';
export type { DatabaseConfig } from './config.js';
export { createPool } from './pool.js';
export { createPgQueryExecutor } from './executor.js';
export type { PgQueryable, QueryExecutor, QueryResult, QueryRow } from './executor.js';
