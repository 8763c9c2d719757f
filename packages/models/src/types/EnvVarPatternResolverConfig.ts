/**
 * Options for resolving ${VAR} references in configuration strings
 */
export interface EnvVarPatternResolverConfig {
  /** Maximum nesting of references (default 10) */
  maxDepth?: number;
  /** Throw on a missing variable that has no default (default true) */
  strict?: boolean;
  /** Variables to read from, defaults to process.env */
  envSource?: Record<string, string | undefined>;
}
