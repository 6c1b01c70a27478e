export type DatabaseConfig = {
  name: string;
  user: string;
  password: string;
  host: string;
  port: number;
  url?: string;
};

/**
 * Read DB__* settings. DATABASE_URL, when present, wins over the individual parts.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const url = env.DATABASE_URL?.trim();
  const name = env.DB__NAME?.trim() ?? '';
  if (!name && !url) {
    throw new Error('DB__NAME or DATABASE_URL must be set');
  }

  const rawPort = env.DB__PORT?.trim() || '5432';
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`DB__PORT must be a valid port number, received "${rawPort}"`);
  }

  return {
    name,
    user: env.DB__USER ?? 'root',
    password: env.DB__PASSWORD ?? 'root',
    host: env.DB__HOST ?? 'localhost',
    port,
    ...(url ? { url } : {}),
  };
}

/**
 * Connection string for the configured database, or for `customName` on the same server
 */
export function getDatabaseUrl(config: DatabaseConfig, customName?: string): string {
  if (config.url) {
    if (!customName) {
      return config.url;
    }
    const url = new URL(config.url);
    url.pathname = `/${encodeURIComponent(customName)}`;
    return url.toString();
  }
  const name = customName ?? config.name;
  const user = encodeURIComponent(config.user);
  const password = encodeURIComponent(config.password);
  return `postgresql://${user}:${password}@${config.host}:${config.port}/${encodeURIComponent(name)}`;
}
