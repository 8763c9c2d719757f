export * from './authentication-error.js';
export * from './configuration-error.js';
export * from './network-error.js';
export * from './protocol-error.js';
export * from './auto-save-error.js';
