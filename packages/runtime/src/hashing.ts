/**
 * Deterministic 32-bit hashing (djb2 family).
 *
 * Every function returns a signed 32-bit integer. Results are stable across
 * runs and processes, except `identityHash`, which numbers objects in the
 * order they are first hashed.
 */

// ============================================================================
// Primitives
// ============================================================================

export const HASH_SEED = 5381;

/**
 * Fold one contribution into a running hash.
 */
export function hashCombine(seed: number, value: number): number {
  return (((seed << 5) + seed) ^ value) | 0;
}

export function hashString(value: string): number {
  let hash = HASH_SEED;
  for (let i = 0; i < value.length; i++) {
    hash = hashCombine(hash, value.charCodeAt(i));
  }
  return hash;
}

/**
 * `0` and `-0` hash alike, as do all NaNs.
 */
export function hashNumber(value: number): number {
  if (Number.isNaN(value)) return 0x7fc00000;
  if (!Number.isFinite(value)) return value > 0 ? 0x7f800000 : 0xff800000 | 0;
  if (Number.isInteger(value) && Math.abs(value) < 2 ** 31) {
    return value | 0;
  }
  return hashString(String(value));
}

export function hashBoolean(value: boolean): number {
  return value ? 1 : 0;
}

export function hashBigint(value: bigint): number {
  return hashString(value.toString());
}

// ============================================================================
// Identity
// ============================================================================

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/**
 * Stable per-object hash for values compared by reference.
 */
export function identityHash(value: object): number {
  let id = identities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(value, id);
  }
  return hashCombine(HASH_SEED, id);
}
