/**
 * Canonical form and digest of a profile
 *
 * The digest is SHA-256 over a version tag and the stable serialization of
 * the profile's semantic fields:
 * - object keys sorted (UTF-16 order, same as Array.prototype.sort)
 * - arrays kept in declared order (install order and mount order matter)
 * - numbers and booleans in their JSON text, strings verbatim
 * - path placeholders ($PWD, ${HOME}, ~) hashed unexpanded
 * - `meta` excluded
 *
 * Because hashing runs over the validated model rather than the file text,
 * TOML formatting, key order, comments and spelled-out defaults do not
 * affect the digest.
 */

import { createHash } from 'node:crypto';
import type { Profile } from '../config/types.js';

/** Bump when the canonical layout changes */
export const CANONICAL_VERSION = 'kiln-profile/v1';

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/** Hex-encoded SHA-256 */
export type Digest = string;

function toCanonical(value: unknown, path: string): CanonicalValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot canonicalize non-finite number at ${path}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toCanonical(item, `${path}[${index}]`) ?? null);
  }
  if (typeof value === 'object') {
    const result: { [key: string]: CanonicalValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const canonical = toCanonical(item, `${path}.${key}`);
      if (canonical !== undefined) {
        result[key] = canonical;
      }
    }
    return result;
  }
  throw new Error(`Cannot canonicalize ${typeof value} at ${path}`);
}

/**
 * Reduce a profile to its semantic content. Undefined optional fields are
 * dropped, so "absent" and "undefined" are the same thing.
 */
export function canonicalize(profile: Profile): CanonicalValue {
  const { meta: _meta, ...semantic } = profile;
  return toCanonical(semantic, 'profile') ?? null;
}

export function stableStringify(value: CanonicalValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const keys = Object.keys(value).sort();
  return '{' + keys.map((k) => JSON.stringify(k) + ':' + stableStringify(value[k])).join(',') + '}';
}

export function canonicalText(profile: Profile): string {
  return `${CANONICAL_VERSION}\n${stableStringify(canonicalize(profile))}`;
}

export function digestProfile(profile: Profile): Digest {
  return createHash('sha256').update(canonicalText(profile), 'utf8').digest('hex');
}

/**
 * Short form for display.
 */
export function shortDigest(digest: Digest): string {
  return digest.slice(0, 12);
}
