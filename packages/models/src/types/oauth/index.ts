/**
 * OAuth 2.0 authorization code client types
 */
export * from './AccessTokenRecord.js';
export * from './AuthorizationRequest.js';
export * from './ClientProfileSettings.js';
export * from './TokenResponse.js';
export * from './TokenScheme.js';
