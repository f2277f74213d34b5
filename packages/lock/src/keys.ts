/** Prefix of the key recording who holds a lock. */
export const HOLDER_PREFIX = 'lock:';

/** Prefix of the list used to wake blocked acquirers. */
export const SIGNAL_PREFIX = 'lock-signal:';

/**
 * The pair of store keys behind one logical lock name.
 * @public
 */
export interface LockKeys {
  holder: string;
  signal: string;
}

/**
 * Maps a lock name to its holder and signal keys.
 *
 * Every process using the same name addresses the same pair.
 *
 * @public
 */
export function lockKeys(name: string): LockKeys {
  return {
    holder: HOLDER_PREFIX + name,
    signal: SIGNAL_PREFIX + name,
  };
}

/**
 * Inverse of {@link lockKeys} for a holder key found by scanning the store.
 * Returns `null` for keys outside the naming convention.
 */
export function keysFromHolder(holderKey: string): LockKeys | null {
  if (!holderKey.startsWith(HOLDER_PREFIX)) {
    return null;
  }
  return lockKeys(holderKey.slice(HOLDER_PREFIX.length));
}
