export * from './types/oauth/index.js';
export type { HttpMethod, OutgoingRequest, TransportResponse } from './types/http/index.js';
export type { EnvVarPatternResolverConfig } from './types/EnvVarPatternResolverConfig.js';
export { GrantTypes, ResponseTypes, TokenLocations } from './enums/auth.js';
