/**
 * Feature set differ
 */

export interface FeatureSetDiff {
  /** In the manifest but not in the library */
  added: string[];
  /** In the library but not in the manifest */
  removed: string[];
}

/**
 * Compare the features a library entry listed with those the manifest
 * currently wires the component into
 */
export function diffFeatureSets(
  library: Iterable<string>,
  manifest: Iterable<string>
): FeatureSetDiff {
  const libSet = new Set(library);
  const manifestSet = new Set(manifest);

  return {
    added: [...manifestSet].filter((feature) => !libSet.has(feature)),
    removed: [...libSet].filter((feature) => !manifestSet.has(feature)),
  };
}

export function hasChanges(diff: FeatureSetDiff): boolean {
  return diff.added.length > 0 || diff.removed.length > 0;
}
