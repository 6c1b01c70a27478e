import {
  HmacSecretHasher,
  type SecretHasher,
  ScryptSecretHasher,
  CryptoTokenGenerator,
} from '@sessionkit/auth';
import {
  type AuthCoreEnvironment,
  type Clock,
  type SessionStore,
  type PermissionLookup,
  JoseTokenCodec,
  SessionIssuer,
  SessionVerifier,
  type SigningKeyStore,
  SystemClock,
  UuidIdentifierGenerator,
  buildKeyStoreFromConfig,
  loadAuthCoreConfig,
} from '@sessionkit/auth-core';
import {
  type QueryExecutor,
  createPgQueryExecutor,
  createPool,
  loadDatabaseConfig,
} from '@sessionkit/database';
import { type Logger, logger as rootLogger } from '@sessionkit/observability';
import type pg from 'pg';
import { PostgresPermissionLookup } from './permissions/permission-repository.js';
import { PostgresSessionStore } from './sessions/session-repository.js';

export type SessionServicesOptions = {
  pool?: pg.Pool;
  executor?: QueryExecutor;
  config?: AuthCoreEnvironment;
  logger?: Logger;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
};

export type SessionServices = {
  issuer: SessionIssuer;
  verifier: SessionVerifier;
  codec: JoseTokenCodec;
  store: SessionStore;
  permissions: PermissionLookup;
  /** Pool the services query through, when they run on one */
  pool: pg.Pool | null;
  /** Ends the pool if these services created it; a pool passed in stays the caller's to end */
  close(): Promise<void>;
};

export function createSecretHasher(
  kind: AuthCoreEnvironment['secretHasher'],
  env: NodeJS.ProcessEnv = process.env
): SecretHasher {
  return kind === 'hmac' ? HmacSecretHasher.fromEnv(env) : new ScryptSecretHasher();
}

type ExecutorBinding = {
  executor: QueryExecutor;
  pool: pg.Pool | null;
  ownsPool: boolean;
};

function bindExecutor(options: SessionServicesOptions, env: NodeJS.ProcessEnv): ExecutorBinding {
  if (options.executor) {
    return { executor: options.executor, pool: options.pool ?? null, ownsPool: false };
  }
  if (options.pool) {
    return { executor: createPgQueryExecutor(options.pool), pool: options.pool, ownsPool: false };
  }
  const pool = createPool(loadDatabaseConfig(env));
  return { executor: createPgQueryExecutor(pool), pool, ownsPool: true };
}

/**
 * Wire the session services against Postgres. Nothing is registered globally; callers own the result.
 */
export async function createSessionServices(
  options: SessionServicesOptions = {}
): Promise<SessionServices> {
  const env = options.env ?? process.env;
  const config = options.config ?? loadAuthCoreConfig(env);
  const logger = options.logger ?? rootLogger;
  const clock = options.clock ?? new SystemClock();

  const keyStore = await buildKeyStoreFromConfig(config);
  const hasher = createSecretHasher(config.secretHasher, env);
  const binding = bindExecutor(options, env);

  try {
    return assemble({ config, logger, clock, keyStore, hasher, binding });
  } catch (error) {
    if (binding.pool && binding.ownsPool) {
      await binding.pool.end();
    }
    throw error;
  }
}

type AssembleInput = {
  config: AuthCoreEnvironment;
  logger: Logger;
  clock: Clock;
  keyStore: SigningKeyStore;
  hasher: SecretHasher;
  binding: ExecutorBinding;
};

function assemble({ config, logger, clock, keyStore, hasher, binding }: AssembleInput): SessionServices {
  const { executor, pool, ownsPool } = binding;
  const codec = new JoseTokenCodec({
    keyStore,
    issuer: config.issuer,
    audience: config.audience,
    clock,
    clockToleranceSeconds: config.clockToleranceSeconds,
  });
  const store = new PostgresSessionStore(executor);
  const permissions = new PostgresPermissionLookup(executor);

  const shared = {
    store,
    permissions,
    hasher,
    codec,
    clock,
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
    permissionLookupFailure: config.permissionLookupFailure,
  };

  const issuer = new SessionIssuer({
    ...shared,
    tokens: new CryptoTokenGenerator(),
    ids: new UuidIdentifierGenerator(),
    secretBits: config.sessionSecretBits,
    logger: logger.child({ component: 'session-issuer' }),
  });
  const verifier = new SessionVerifier({
    ...shared,
    logger: logger.child({ component: 'session-verifier' }),
  });

  let closed = false;
  return {
    issuer,
    verifier,
    codec,
    store,
    permissions,
    pool,
    async close() {
      if (!pool || !ownsPool || closed) {
        return;
      }
      closed = true;
      await pool.end();
    },
  };
}
