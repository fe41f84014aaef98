/**
 * Manifest module exports
 */

export type {
  ComponentRecord,
  ManifestFileRecord,
  FeatureReference,
  ManifestSource,
  ManifestSourceList,
} from './types.js';
export { DEFAULT_MANIFEST_SOURCES } from './types.js';

export { parseManifestSource, loadManifestSource, loadManifestSources } from './loader.js';

export { ManifestIndex, normalizeGuid, type ManifestIndexOptions } from './manifest-index.js';
