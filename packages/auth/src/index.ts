// Errors
export * from './errors/index.js';

// Implementations
export * from './implementations/client-profile.js';
export * from './implementations/access-token.js';
export * from './implementations/token-exchanger.js';
export * from './implementations/change-notifier.js';
export * from './implementations/request-authenticator.js';
export * from './implementations/session-token-registry.js';
export * from './implementations/memory-token-store.js';

// Configuration
export * from './schemas.js';
export {
  resolveClientProfileConfig,
  loadClientProfileConfigFromEnv,
  CLIENT_PROFILE_ENV_VARS,
} from './utils/oauth-utils.js';

export * from './utils/index.js';
