// Transport domain re-exports - single entry point for transport functionality

export * from './errors/transport-error.js';
export type { HttpTransport } from './http-transport.js';
export * from './implementations/fetch-http-transport.js';
