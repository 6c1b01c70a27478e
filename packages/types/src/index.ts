export * from './access-token.schema.js';
export * from './session.schema.js';
