/**
 * Diagnostics module exports
 */

export {
  ERROR_CODES,
  WARNING_CODES,
  CODE_CATALOGUE,
  describeCode,
  type Severity,
  type ErrorCode,
  type WarningCode,
  type CodeInfo,
} from './codes.js';

export {
  DiagnosticLog,
  errorDiagnostic,
  warningDiagnostic,
  type Diagnostic,
  type FragmentEntry,
  type NoteEntry,
  type LogEntry,
  type LogSummary,
} from './log.js';

export { renderReport, renderEntry, renderHeader, type ReportHeader } from './report.js';

export {
  IntegrityError,
  InstallerRootError,
  ManifestLoadError,
  LibraryLoadError,
  ConfigError,
  GitNotAvailableError,
  GitCommandError,
  isIntegrityError,
  formatError,
} from './errors.js';
