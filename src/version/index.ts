/**
 * Version codec exports
 */

export {
  MAX_SEGMENT_VALUE,
  MAX_SEGMENTS,
  ZERO_VERSION,
  ZERO_ORDINAL,
  InvalidVersionError,
  encodeVersion,
  tryEncodeVersion,
  compareVersions,
  truncate3,
  versionSegments,
  formatVersion,
  sameFirstThreeSegments,
  type VersionOrdinal,
  type VersionComparison,
  type EncodeResult,
} from './ordinal.js';
