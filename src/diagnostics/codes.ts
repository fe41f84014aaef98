/**
 * Diagnostic taxonomy
 *
 * Codes are stable: build scripts and people grep reports for them.
 * Errors 1-9 mean a patch built from the current tree will (or may) fail;
 * warnings 1-4 are hygiene problems.
 */

export type Severity = 'error' | 'warning';

export type ErrorCode = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
export type WarningCode = 1 | 2 | 3 | 4;

/**
 * Catalogue entry for a diagnostic code
 */
export interface CodeInfo {
  severity: Severity;
  code: number;
  /** Short machine-friendly name */
  name: string;
  /** One-line description used by `installer-integrity codes` */
  summary: string;
  /** No longer emitted, listed for completeness */
  deprecated?: boolean;
}

export const ERROR_CODES = {
  MODIFIED_WITHOUT_VERSION_BUMP: 1,
  DATE_REGRESSION: 2,
  MISSING_FEATURE_LIST: 3,
  FEATURE_ADDED: 4,
  FEATURE_REMOVED: 5,
  VERSION_LOWERED: 6,
  INVALID_VERSION: 7,
  IGNORED_SEGMENT_ONLY: 8,
  VERSION_REMOVED: 9,
} as const satisfies Record<string, ErrorCode>;

export const WARNING_CODES = {
  NO_FILE_LIBRARY: 1,
  UNTRACKED_FILES: 2,
  ZERO_VERSION: 3,
  SOURCE_CONTROL_QUERY_FAILED: 4,
} as const satisfies Record<string, WarningCode>;

export const CODE_CATALOGUE: readonly CodeInfo[] = [
  { severity: 'error', code: 1, name: 'modified-without-version-bump', summary: 'File modified since the last release but its version is unchanged' },
  { severity: 'error', code: 2, name: 'date-regression', summary: 'File date/time is more than 24 hours earlier than the released one' },
  { severity: 'error', code: 3, name: 'missing-feature-list', summary: 'Library entry has no FeatureList attribute' },
  { severity: 'error', code: 4, name: 'feature-added', summary: 'File has been added to features since the last release' },
  { severity: 'error', code: 5, name: 'feature-removed', summary: 'File has been removed from features since the last release' },
  { severity: 'error', code: 6, name: 'version-lowered', summary: 'File version is lower than in the last release' },
  { severity: 'error', code: 7, name: 'invalid-version', summary: 'File or library version cannot be parsed' },
  { severity: 'error', code: 8, name: 'ignored-segment-only', summary: 'Version changed only in the 4th segment, which the installer ignores' },
  { severity: 'error', code: 9, name: 'version-removed', summary: 'File had version information in the last release but has none now' },
  { severity: 'warning', code: 1, name: 'no-file-library', summary: 'There is no FileLibrary', deprecated: true },
  { severity: 'warning', code: 2, name: 'untracked-files', summary: 'Files present in DistFiles but not checked into source control' },
  { severity: 'warning', code: 3, name: 'zero-version', summary: 'File has a version number of 0.0.0.0' },
  { severity: 'warning', code: 4, name: 'source-control-query-failed', summary: 'Could not query source control for untracked files' },
];

/**
 * Look up the catalogue entry for a code
 */
export function describeCode(severity: Severity, code: number): CodeInfo | undefined {
  return CODE_CATALOGUE.find((info) => info.severity === severity && info.code === code);
}
