export { generateRequestId } from './generateRequestId.js';
export { generateSessionId } from './generateSessionId.js';
