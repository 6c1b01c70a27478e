import pg from 'pg';
import { type DatabaseConfig, getDatabaseUrl, loadDatabaseConfig } from './config.js';

export function createPool(
  config: DatabaseConfig = loadDatabaseConfig(),
  options: Omit<pg.PoolConfig, 'connectionString'> = {}
): pg.Pool {
  return new pg.Pool({ ...options, connectionString: getDatabaseUrl(config) });
}
