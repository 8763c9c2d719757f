/**
 * Validation helpers for configuration values.
 *
 * All failures throw plain Errors prefixed with the given context; callers
 * translate them into their own error types.
 * @public
 */

/**
 * Validates that a string parses as an absolute URL.
 * @param url - URL string to validate
 * @param context - Optional context string for error messages
 * @throws \{Error\} When URL is empty or invalid format
 * @internal
 */
function validateUrl(url: string, context?: string): URL {
  if (!url) {
    throw new Error(`${context ? context + ': ' : ''}URL is required`);
  }

  try {
    return new URL(url);
  } catch {
    throw new Error(`${context ? context + ': ' : ''}Invalid URL format: ${url}`);
  }
}

/**
 * Validates an absolute http(s) URL, the only kind an authorization server lives at.
 * @internal
 */
function validateHttpUrl(url: string, context?: string): URL {
  const parsed = validateUrl(url, context);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(
      `${context ? context + ': ' : ''}URL must use http or https: ${url}`,
    );
  }
  return parsed;
}

/**
 * Collection of validation utility functions.
 * @example
 * ```typescript
 * ValidationUtils.validateHttpUrl('https://auth.example.com', 'site');
 * ValidationUtils.validateRequired(config, ['clientId', 'clientSecret'], 'ClientProfile');
 * ```
 * @public
 */
export const ValidationUtils = {
  validateUrl,
  validateHttpUrl,
  /**
   * Validates that required string fields are present and not blank.
   * @param config - Configuration object to validate
   * @param requiredFields - Field names that must be present
   * @param context - Optional context string for error messages
   * @throws \{Error\} When any required field is missing or blank
   */
  validateRequired: <T extends object>(
    config: T,
    requiredFields: readonly (keyof T)[],
    context?: string,
  ): void => {
    for (const field of requiredFields) {
      const value = config[field];
      if (value === undefined || value === null || (typeof value === 'string' && !value.trim())) {
        throw new Error(
          `${context ? context + ': ' : ''}Missing required field: ${String(field)}`,
        );
      }
    }
  },
};
