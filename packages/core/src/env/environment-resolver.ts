import type { EnvVarPatternResolverConfig } from '@tokenwright/models';

/**
 * Error thrown when a ${VAR} reference in configuration cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }
}

const REFERENCE_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;
const CONTAINS_REFERENCE = /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/;

/**
 * Resolves `${VAR}` and `${VAR:default}` references in configuration strings.
 *
 * Values pulled from the environment are resolved again, so references may
 * nest; cycles and runaway nesting raise {@link EnvironmentResolutionError}.
 * Variable names are upper-case identifiers only.
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { OAUTH_SITE: 'https://auth.example.com' } });
 * resolver.resolve('${OAUTH_SITE}/oauth/token');
 * // 'https://auth.example.com/oauth/token'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Replaces every reference in `value`.
   * @param value - String containing references
   * @param visited - Variables on the current resolution path
   * @param depth - Current nesting depth
   * @throws {EnvironmentResolutionError} On cycles, excessive depth, or a missing variable in strict mode
   * @public
   */
  public resolve(
    value: string,
    visited: ReadonlySet<string> = new Set(),
    depth: number = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      REFERENCE_PATTERN,
      (match: string, name: string, fallback?: string) => {
        if (visited.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visited).add(name);
        const envValue = this.envSource[name];

        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.resolve(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }

  public static containsPattern(value: string): boolean {
    return CONTAINS_REFERENCE.test(value);
  }
}

/**
 * Resolves references in the given string fields of a config object.
 *
 * Returns a copy; fields not listed, and non-string values, are left alone.
 * @param config - Configuration object
 * @param fields - Field names to resolve
 * @param envSource - Variables to read from, defaults to process.env
 * @throws {EnvironmentResolutionError} When a reference cannot be resolved
 * @public
 */
export function resolveConfigFields<T extends object>(
  config: T,
  fields: readonly (keyof T)[],
  envSource?: Record<string, string | undefined>,
): T {
  const resolver = new EnvVarPatternResolver({ envSource });
  const resolved = { ...config };

  for (const field of fields) {
    const value = resolved[field];
    if (typeof value === 'string' && EnvVarPatternResolver.containsPattern(value)) {
      Object.assign(resolved, { [field]: resolver.resolve(value) });
    }
  }

  return resolved;
}
