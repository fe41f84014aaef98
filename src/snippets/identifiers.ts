/**
 * Deterministic WiX identifiers
 *
 * WiX identifiers may contain A-Z, a-z, digits, underscores and periods,
 * must start with a letter or underscore, and are limited to 72
 * characters. `makeId` derives one from a readable name plus the MD5 of
 * a seed, so the same name/seed pair always yields the same id.
 */

import { createHash, randomUUID } from 'node:crypto';

/** Longest identifier WiX accepts */
export const MAX_ID_LENGTH = 72;

const VALID_CHAR = /[A-Za-z0-9_.]/;
const VALID_START_CHAR = /[A-Za-z_]/;

/**
 * MD5 of a string's UTF-8 bytes, as 32 upper-case hex characters
 */
export function md5Hex(value: string | Buffer): string {
  return createHash('md5').update(value).digest('hex').toUpperCase();
}

/**
 * Replace invalid characters with `_` and make sure the first one is a
 * letter or underscore
 */
export function sanitizeIdName(name: string): string {
  let candidate = '';
  for (const char of name) {
    // One replacement per UTF-16 unit, so astral characters become "__"
    candidate += VALID_CHAR.test(char) ? char : '_'.repeat(char.length);
  }
  if (!VALID_START_CHAR.test(candidate.charAt(0))) {
    candidate = `_${candidate}`;
  }
  return candidate;
}

/**
 * Build an identifier from a name and unique seed data
 *
 * @example
 * makeId('DelFoo Bar.dll', 'FooComponent') // 'DelFoo_Bar.dll.' + md5Hex('FooComponent')
 */
export function makeId(name: string, seed: string): string {
  const hash = md5Hex(seed);
  const maxNameLength = MAX_ID_LENGTH - hash.length - 1;
  const candidate = sanitizeIdName(name).slice(0, maxNameLength);
  return `${candidate}.${hash}`;
}

/**
 * Source of new component GUIDs
 */
export type GuidGenerator = () => string;

/**
 * Random GUID in the upper-case form WiX sources use
 */
export const randomGuid: GuidGenerator = () => randomUUID().toUpperCase();
