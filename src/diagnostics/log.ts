/**
 * Append-only diagnostic log
 *
 * Entries are kept in emission order and never mutated or removed.
 * Besides coded diagnostics the log carries corrective fragments and
 * free-form notes, which render as XML comments in the report.
 */

import type { ErrorCode, Severity, WarningCode } from './codes.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A coded error or warning
 */
export interface Diagnostic {
  kind: 'diagnostic';
  severity: Severity;
  code: number;
  message: string;
  /** Library path, registry key or GUID the diagnostic is about */
  subject?: string;
}

/**
 * Lines of a corrective manifest fragment (comments included)
 */
export interface FragmentEntry {
  kind: 'fragment';
  lines: readonly string[];
  subject?: string;
}

/**
 * Informational text
 */
export interface NoteEntry {
  kind: 'note';
  message: string;
}

export type LogEntry = Diagnostic | FragmentEntry | NoteEntry;

/**
 * Counts for JSON output
 */
export interface LogSummary {
  errors: number;
  warnings: number;
  fragments: number;
  notes: number;
  /** Keyed as "error:6" / "warning:3" */
  byCode: Record<string, number>;
}

// =============================================================================
// Builders
// =============================================================================

export function errorDiagnostic(code: ErrorCode, message: string, subject?: string): Diagnostic {
  return { kind: 'diagnostic', severity: 'error', code, message, subject };
}

export function warningDiagnostic(code: WarningCode, message: string, subject?: string): Diagnostic {
  return { kind: 'diagnostic', severity: 'warning', code, message, subject };
}

function freezeEntry(entry: LogEntry): LogEntry {
  if (entry.kind === 'fragment') {
    return Object.freeze({ ...entry, lines: Object.freeze([...entry.lines]) });
  }
  return Object.freeze({ ...entry });
}

// =============================================================================
// Log
// =============================================================================

export class DiagnosticLog {
  private readonly entries: LogEntry[] = [];

  /**
   * Append one or more entries
   *
   * Entries are copied and frozen, so neither the caller's objects nor the
   * ones handed out later can change what the log holds.
   */
  append(...entries: LogEntry[]): void {
    for (const entry of entries) {
      this.entries.push(freezeEntry(entry));
    }
  }

  error(code: ErrorCode, message: string, subject?: string): void {
    this.append(errorDiagnostic(code, message, subject));
  }

  warning(code: WarningCode, message: string, subject?: string): void {
    this.append(warningDiagnostic(code, message, subject));
  }

  note(message: string): void {
    this.append({ kind: 'note', message });
  }

  fragment(lines: readonly string[], subject?: string): void {
    this.append({ kind: 'fragment', lines, subject });
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  all(): readonly LogEntry[] {
    return [...this.entries];
  }

  diagnostics(severity?: Severity): Diagnostic[] {
    return this.entries.filter(
      (entry): entry is Diagnostic =>
        entry.kind === 'diagnostic' && (severity === undefined || entry.severity === severity)
    );
  }

  hasErrors(): boolean {
    return this.diagnostics('error').length > 0;
  }

  toJSON(): { summary: LogSummary; entries: readonly LogEntry[] } {
    return { summary: this.summary(), entries: this.all() };
  }

  summary(): LogSummary {
    const summary: LogSummary = { errors: 0, warnings: 0, fragments: 0, notes: 0, byCode: {} };
    for (const entry of this.entries) {
      switch (entry.kind) {
        case 'diagnostic': {
          if (entry.severity === 'error') summary.errors++;
          else summary.warnings++;
          const key = `${entry.severity}:${entry.code}`;
          summary.byCode[key] = (summary.byCode[key] ?? 0) + 1;
          break;
        }
        case 'fragment':
          summary.fragments++;
          break;
        case 'note':
          summary.notes++;
          break;
      }
    }
    return summary;
  }
}
