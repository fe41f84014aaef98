/**
 * Report rendering
 *
 * Turns a DiagnosticLog into the plain-text report that is written to the
 * log file. Layout:
 *
 *   Current source control branch: develop
 *   ERROR #6: File Output\${config}\Foo.dll had a version of ...
 *   <!-- File component {GUID} [path] is missing from (Auto)Files.wxs -->
 *   <DirectoryRef Id="...">
 *   ...
 *   (blank line after each fragment)
 */

import type { DiagnosticLog, LogEntry } from './log.js';
import { escapeXmlComment } from '../utils/xml.js';

/**
 * Build details that precede the diagnostics
 */
export interface ReportHeader {
  /** Current source control branch, if known */
  branch?: string;
  /** Extra lines, printed verbatim */
  lines?: string[];
}

/**
 * Render a single entry as report lines
 */
export function renderEntry(entry: LogEntry): string[] {
  switch (entry.kind) {
    case 'diagnostic': {
      const label = entry.severity === 'error' ? 'ERROR' : 'WARNING';
      return [`${label} #${entry.code}: ${entry.message}`];
    }
    case 'fragment':
      return [...entry.lines, ''];
    case 'note':
      return [`<!-- ${escapeXmlComment(entry.message)} -->`];
  }
}

/**
 * Render the header block
 */
export function renderHeader(header: ReportHeader): string[] {
  const lines: string[] = [];
  if (header.branch) {
    lines.push(`Current source control branch: ${header.branch}`);
  }
  lines.push(...(header.lines ?? []));
  return lines;
}

/**
 * Render the whole log
 *
 * @returns report text, or null when the log is empty (no report is produced)
 */
export function renderReport(log: DiagnosticLog, header: ReportHeader = {}): string | null {
  if (log.isEmpty) {
    return null;
  }

  const lines = renderHeader(header);
  for (const entry of log.all()) {
    lines.push(...renderEntry(entry));
  }
  return lines.join('\n') + '\n';
}
