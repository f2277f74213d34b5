import { randomBytes } from 'node:crypto';

/**
 * Generates a random base64 token of exactly `length` characters.
 *
 * Used as the default owner id of a {@link Lock}.
 *
 * @public
 */
export function generateToken(length = 22): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError('Token length must be positive');
  }

  // 3 bytes encode to 4 base64 characters
  const bytes = randomBytes(Math.ceil((length * 3) / 4));
  return bytes.toString('base64').slice(0, length);
}
