/**
 * DistFiles hygiene
 *
 * Anything in DistFiles ships with the installer, so it should be under
 * source control unless the configuration says otherwise.
 */

import type { Diagnostic } from '../diagnostics/log.js';
import { warningDiagnostic } from '../diagnostics/log.js';
import { WARNING_CODES } from '../diagnostics/codes.js';
import type { IntegrityConfig } from '../config/integrity-config.js';
import type { UntrackedQuery } from '../source-control/git.js';
import { matchesAnyPattern } from '../utils/paths.js';

/** Indent for each listed file in Warning 2 */
const LIST_INDENT = '    ';

/**
 * Untracked files that are not exempted by configuration
 */
export function filterUntrackedFiles(
  files: readonly string[],
  config: Pick<IntegrityConfig, 'nonVersionedDistFiles' | 'omissions'>,
  buildType: string
): string[] {
  return files.filter(
    (file) =>
      !matchesAnyPattern(file, config.nonVersionedDistFiles, buildType) &&
      !matchesAnyPattern(file, config.omissions, buildType)
  );
}

export function checkUntrackedFiles(
  query: UntrackedQuery,
  config: Pick<IntegrityConfig, 'nonVersionedDistFiles' | 'omissions'>,
  buildType: string
): Diagnostic[] {
  if (!query.ok) {
    return [
      warningDiagnostic(
        WARNING_CODES.SOURCE_CONTROL_QUERY_FAILED,
        `Could not determine if DistFiles folder is consistent with source control: ${query.reason}`
      ),
    ];
  }

  const remaining = filterUntrackedFiles(query.files, config, buildType);
  if (remaining.length === 0) return [];

  const listing = remaining.map((file) => `\n${LIST_INDENT}${file}`).join('');
  return [
    warningDiagnostic(
      WARNING_CODES.UNTRACKED_FILES,
      `The following files are present in DistFiles but not checked into source control: ${listing}`
    ),
  ];
}
