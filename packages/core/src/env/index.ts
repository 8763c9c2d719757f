export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
} from './environment-resolver.js';
