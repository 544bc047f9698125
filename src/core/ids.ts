/**
 * Object id generation
 */
import { randomBytes } from 'crypto';

/**
 * Prefix of every id this tool creates
 */
export const ID_PREFIX = 'AA';

/**
 * Generate a short object id: "AA" followed by 6 uppercase hex characters.
 *
 * Ids are not checked against the manifest; collisions are left to the random source.
 */
export function generateXcodeId(): string {
  return `${ID_PREFIX}${randomBytes(3).toString('hex').toUpperCase()}`;
}
