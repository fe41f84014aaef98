/**
 * Checks for one FileLibrary entry
 *
 * Run in order: presence, feature membership, detail. Each returns the
 * entries it wants logged; nothing here touches the log directly.
 */

import type { FileLibraryEntry } from '../../library/types.js';
import type { ManifestIndex } from '../../manifest/manifest-index.js';
import type { FileProbe } from '../../probes/file-probe.js';
import type { Diagnostic, FragmentEntry } from '../../diagnostics/log.js';
import { errorDiagnostic, warningDiagnostic } from '../../diagnostics/log.js';
import { ERROR_CODES, WARNING_CODES } from '../../diagnostics/codes.js';
import { formatLibraryDate, truncateToMinute } from '../../library/dates.js';
import { synthesizeFileFragment, type SynthesizeOptions } from '../../snippets/fragment.js';
import {
  ZERO_VERSION,
  compareVersions,
  sameFirstThreeSegments,
  tryEncodeVersion,
} from '../../version/ordinal.js';
import { matchesAnyPattern, resolveLibraryPath } from '../../utils/paths.js';
import { diffFeatureSets } from '../features/diff.js';

/** A file may be this much older than its released copy before Error 2 */
export const DATE_TOLERANCE_MS = 24 * 60 * 60 * 1000;

export interface DetailCheckContext {
  projectRoot: string;
  buildType: string;
  /** Patterns exempt from the 0.0.0.0 warning */
  versionZeroFiles: readonly string[];
  probe: FileProbe;
}

// =============================================================================
// Presence
// =============================================================================

/**
 * Fragment for an entry whose component GUID is gone from the manifest
 */
export function checkFilePresence(
  entry: FileLibraryEntry,
  manifest: ManifestIndex,
  options: SynthesizeOptions = {}
): FragmentEntry[] {
  // Entries without a GUID are reported when the library loads
  if (!entry.componentGuid || manifest.findComponent(entry.componentGuid)) {
    return [];
  }

  const duplicate = manifest.findFileElsewhere(entry.longName || entry.shortName, entry.directoryId);
  const fragment = synthesizeFileFragment(entry, duplicate, options);
  return [{ kind: 'fragment', lines: fragment.lines, subject: entry.path }];
}

// =============================================================================
// Feature membership
// =============================================================================

export function checkFeatureMembership(entry: FileLibraryEntry, manifest: ManifestIndex): Diagnostic[] {
  if (entry.featureList.length === 0) {
    return [
      errorDiagnostic(
        ERROR_CODES.MISSING_FEATURE_LIST,
        `Library contains file ${entry.path} with no FeatureList attribute.`,
        entry.path
      ),
    ];
  }

  const component = manifest.getComponent(entry.componentGuid);
  if (!component) return [];

  const diff = diffFeatureSets(entry.featureList, manifest.featuresReferencing(component.id));
  const diagnostics: Diagnostic[] = [];

  if (diff.added.length > 0) {
    diagnostics.push(
      errorDiagnostic(
        ERROR_CODES.FEATURE_ADDED,
        `File ${entry.path} has been added to the following features since the last release: ${diff.added.join(', ')}. Patching will fail.`,
        entry.path
      )
    );
  }
  if (diff.removed.length > 0) {
    diagnostics.push(
      errorDiagnostic(
        ERROR_CODES.FEATURE_REMOVED,
        `File ${entry.path} has been removed from the following features since the last release: ${diff.removed.join(', ')}. Patching will fail.`,
        entry.path
      )
    );
  }
  return diagnostics;
}

// =============================================================================
// Detail
// =============================================================================

/**
 * Compare the built file with what was released
 *
 * Skipped (no diagnostics) when the file is not on disk.
 */
export async function checkFileDetails(
  entry: FileLibraryEntry,
  context: DetailCheckContext
): Promise<Diagnostic[]> {
  const fullPath = resolveLibraryPath(context.projectRoot, entry.path, context.buildType);
  const facts = await context.probe(fullPath);
  if (!facts) return [];

  const diagnostics: Diagnostic[] = [];
  const path = entry.path;
  const libVersion = entry.releasedVersion;
  const realVersion = facts.version;

  if (
    facts.md5.toUpperCase() !== entry.releasedMd5.toUpperCase() &&
    libVersion !== '' &&
    realVersion !== ''
  ) {
    if (libVersion === realVersion) {
      diagnostics.push(
        errorDiagnostic(
          ERROR_CODES.MODIFIED_WITHOUT_VERSION_BUMP,
          `File ${path} has been modified since the last release, but its version remains at ${realVersion}. Patching will fail.`,
          path
        )
      );
    } else if (sameFirstThreeSegments(realVersion, libVersion)) {
      diagnostics.push(
        errorDiagnostic(
          ERROR_CODES.IGNORED_SEGMENT_ONLY,
          `File ${path} has a version number (${realVersion}) that has only changed in the 4th segment since the last release (${libVersion}). The 4th version segment is ignored by the installer. Patching will fail.`,
          path
        )
      );
    }
  }

  if (entry.releasedAt) {
    const current = truncateToMinute(facts.modifiedAt);
    if (entry.releasedAt.getTime() - current.getTime() > DATE_TOLERANCE_MS) {
      diagnostics.push(
        errorDiagnostic(
          ERROR_CODES.DATE_REGRESSION,
          `File ${path} has a date/time stamp (${formatLibraryDate(current)}) that is earlier than a previously released version (${entry.releasedDate}). Patching may fail.`,
          path
        )
      );
    }
  }

  if (realVersion === ZERO_VERSION && !matchesAnyPattern(fullPath, context.versionZeroFiles, context.buildType)) {
    diagnostics.push(
      warningDiagnostic(WARNING_CODES.ZERO_VERSION, `File ${path} has a version number of ${ZERO_VERSION}.`, path)
    );
  }

  if (libVersion !== '' && realVersion === '') {
    diagnostics.push(
      errorDiagnostic(
        ERROR_CODES.VERSION_REMOVED,
        `File ${path} had a version of ${libVersion} in the last release. The version information has since been removed. Patching will fail.`,
        path
      )
    );
    return diagnostics;
  }

  const invalidVersion = (reason: string): Diagnostic =>
    errorDiagnostic(
      ERROR_CODES.INVALID_VERSION,
      `File ${path} has invalid version number (possibly in FileLibrary.xml): ${reason}`,
      path
    );

  const current = tryEncodeVersion(realVersion);
  const released = tryEncodeVersion(libVersion);
  if (!current.ok) {
    diagnostics.push(invalidVersion(current.error.message));
  } else if (!released.ok) {
    diagnostics.push(invalidVersion(released.error.message));
  } else if (compareVersions(current.ordinal, released.ordinal) === 'less') {
    diagnostics.push(
      errorDiagnostic(
        ERROR_CODES.VERSION_LOWERED,
        `File ${path} had a version of ${libVersion} in the last release. The version has since been lowered to ${realVersion}. Patching will fail.`,
        path
      )
    );
  }

  return diagnostics;
}
