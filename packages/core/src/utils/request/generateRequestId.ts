import { randomBytes } from 'crypto';

/**
 * Id tying together the log events of one token endpoint request, as
 * `[prefix_]<epoch ms>_<8 hex chars>`.
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const suffix = randomBytes(4).toString('hex');
  return prefix ? `${prefix}_${Date.now()}_${suffix}` : `${Date.now()}_${suffix}`;
}
