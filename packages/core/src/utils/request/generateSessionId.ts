import { v4 as uuidv4 } from 'uuid';

/**
 * Random v4 UUID naming a browser session; the key tokens are registered and
 * auto-saved under.
 * @public
 */
export function generateSessionId(): string {
  return uuidv4();
}
