export * from './auth-url.js';
export { generateState } from './state.js';
export { parseTokenScheme, DEFAULT_TOKEN_SCHEME } from './token-scheme.js';
export { parseTokenResponse } from './token/parse-token-response.js';
export { parseErrorResponse } from './error/parse-error-response.js';
export { createAutoSaveHook, type TokenKeyResolver } from './auto-save.js';
