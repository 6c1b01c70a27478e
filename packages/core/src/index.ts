export { PostgresSessionStore, SESSIONS_TABLE } from './sessions/session-repository.js';
export {
  PostgresPermissionLookup,
  USER_PERMISSIONS_TABLE,
} from './permissions/permission-repository.js';
export { createSessionServices, createSecretHasher } from './services.js';
export type { SessionServices, SessionServicesOptions } from './services.js';
