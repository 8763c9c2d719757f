export * from './logger.js';
export * from './validation-utils.js';
export * from './transports/index.js';
export type { IAuthProvider, ITokenStore } from './auth/index.js';

export * as RequestUtils from './utils/request/index.js';

// Logging with redaction
export { rootLogger, resolveLogLevel, REDACT_PATHS } from './logging/index.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
} from './env/index.js';
