/**
 * Version ordinal codec
 *
 * Packs a dot-separated version string ("X.Y.Z.Q") into a single 64-bit
 * ordinal so that versions compare numerically. Each segment occupies 16
 * bits, the first segment in the most significant position. Missing
 * trailing segments are zero, so "1.2" encodes the same as "1.2.0.0".
 *
 * The installer's patch engine ignores the 4th segment when deciding
 * whether a file changed; `truncate3` projects an ordinal onto the first
 * three segments for that rule.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Packed, order-preserving version
 */
export interface VersionOrdinal {
  /** Packed 64-bit value */
  readonly value: bigint;
}

/**
 * Result of comparing two ordinals
 */
export type VersionComparison = 'less' | 'equal' | 'greater';

/**
 * Result of a non-throwing encode
 */
export type EncodeResult =
  | { ok: true; ordinal: VersionOrdinal }
  | { ok: false; error: InvalidVersionError };

// =============================================================================
// Constants
// =============================================================================

/** Largest value a single segment may hold */
export const MAX_SEGMENT_VALUE = 65535;

/** Number of segments an ordinal can represent */
export const MAX_SEGMENTS = 4;

const SEGMENT_BITS = 16n;
const SEGMENT_MASK = 0xffffn;
const DIGITS = /^[0-9]+$/;

/** Textual form of the zero version */
export const ZERO_VERSION = '0.0.0.0';

/** The zero ordinal; also what the empty string encodes to */
export const ZERO_ORDINAL: VersionOrdinal = Object.freeze({ value: 0n });

// =============================================================================
// Errors
// =============================================================================

/**
 * Thrown when a version string cannot be encoded
 */
export class InvalidVersionError extends Error {
  constructor(
    message: string,
    public readonly version: string,
    public readonly segmentIndex?: number
  ) {
    super(message);
    this.name = 'InvalidVersionError';
  }
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Encode a version string as an ordinal
 *
 * @example
 * encodeVersion('1.2.3.4').value // 0x0001000200030004n
 * encodeVersion('')          // ZERO_ORDINAL
 *
 * @throws InvalidVersionError on a non-numeric segment, a segment above
 *   65535, or more than four segments
 */
export function encodeVersion(version: string): VersionOrdinal {
  if (version === '') {
    return ZERO_ORDINAL;
  }

  const segments = version.split('.');
  if (segments.length > MAX_SEGMENTS) {
    throw new InvalidVersionError(
      `Version ${version} has ${segments.length} segments; at most ${MAX_SEGMENTS} are allowed.`,
      version
    );
  }

  let packed = 0n;
  for (let i = 0; i < MAX_SEGMENTS; i++) {
    const segment = segments[i];
    let numeric = 0n;
    if (segment !== undefined) {
      if (!DIGITS.test(segment)) {
        throw new InvalidVersionError(
          `Segment index ${i} of version ${version} is not a number.`,
          version,
          i
        );
      }
      numeric = BigInt(segment);
      if (numeric > BigInt(MAX_SEGMENT_VALUE)) {
        throw new InvalidVersionError(
          `Segment index ${i} of version ${version} is more than ${MAX_SEGMENT_VALUE}.`,
          version,
          i
        );
      }
    }
    packed = (packed << SEGMENT_BITS) | numeric;
  }

  return { value: packed };
}

/**
 * Encode without throwing
 */
export function tryEncodeVersion(version: string): EncodeResult {
  try {
    return { ok: true, ordinal: encodeVersion(version) };
  } catch (err) {
    if (err instanceof InvalidVersionError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Total order over ordinals
 */
export function compareVersions(a: VersionOrdinal, b: VersionOrdinal): VersionComparison {
  if (a.value < b.value) return 'less';
  if (a.value > b.value) return 'greater';
  return 'equal';
}

/**
 * Drop the 4th (ignored) segment
 */
export function truncate3(ordinal: VersionOrdinal): VersionOrdinal {
  return { value: ordinal.value & ~SEGMENT_MASK };
}

/**
 * Split an ordinal back into its four segments
 */
export function versionSegments(ordinal: VersionOrdinal): [number, number, number, number] {
  const at = (index: number): number =>
    Number((ordinal.value >> (SEGMENT_BITS * BigInt(MAX_SEGMENTS - 1 - index))) & SEGMENT_MASK);
  return [at(0), at(1), at(2), at(3)];
}

/**
 * Render an ordinal as "X.Y.Z.Q"
 */
export function formatVersion(ordinal: VersionOrdinal): string {
  return versionSegments(ordinal).join('.');
}

/**
 * True when both versions encode and only differ in the 4th segment (or not at all)
 */
export function sameFirstThreeSegments(a: string, b: string): boolean {
  const left = tryEncodeVersion(a);
  const right = tryEncodeVersion(b);
  if (!left.ok || !right.ok) {
    return false;
  }
  return compareVersions(truncate3(left.ordinal), truncate3(right.ordinal)) === 'equal';
}
