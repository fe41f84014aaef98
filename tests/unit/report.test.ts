/**
 * Tests for the diagnostic log and report rendering
 */

import { describe, it, expect } from 'vitest';
import { DiagnosticLog, renderEntry, renderReport, describeCode } from '../../src/diagnostics/index.js';

describe('DiagnosticLog', () => {
  it('keeps entries in emission order', () => {
    const log = new DiagnosticLog();
    log.warning(3, 'zero');
    log.error(6, 'lowered');
    log.note('info');
    expect(log.all().map((e) => e.kind)).toEqual(['diagnostic', 'diagnostic', 'note']);
    expect(log.size).toBe(3);
  });

  it('freezes appended entries', () => {
    const log = new DiagnosticLog();
    log.error(1, 'modified');
    expect(Object.isFrozen(log.all()[0])).toBe(true);
  });

  it('copies and freezes fragment lines', () => {
    const log = new DiagnosticLog();
    const lines = ['<!-- a -->'];
    log.append({ kind: 'fragment', lines });
    lines.push('<Late/>');

    const [entry] = log.all();
    expect(entry?.kind === 'fragment' && Object.isFrozen(entry.lines)).toBe(true);
    expect(renderReport(log)).toBe('<!-- a -->\n\n');
  });

  it('rejects changes made through returned entries', () => {
    const log = new DiagnosticLog();
    log.fragment(['<!-- a -->']);
    const [entry] = log.all();
    expect(() => {
      if (entry?.kind === 'fragment') {
        Reflect.apply(Array.prototype.push, entry.lines, ['<Late/>']);
      }
    }).toThrow(TypeError);
    expect(renderReport(log)).toBe('<!-- a -->\n\n');
  });

  it('does not expose its internal list', () => {
    const log = new DiagnosticLog();
    log.note('a');
    const snapshot = log.all();
    log.note('b');
    expect(snapshot).toHaveLength(1);
  });

  it('filters diagnostics by severity', () => {
    const log = new DiagnosticLog();
    log.warning(2, 'untracked');
    expect(log.hasErrors()).toBe(false);
    log.error(9, 'removed');
    expect(log.hasErrors()).toBe(true);
    expect(log.diagnostics('warning').map((d) => d.code)).toEqual([2]);
  });

  it('summarises counts by code', () => {
    const log = new DiagnosticLog();
    log.error(6, 'a');
    log.error(6, 'b');
    log.warning(3, 'c');
    log.fragment(['<!-- x -->']);
    expect(log.summary()).toEqual({
      errors: 2,
      warnings: 1,
      fragments: 1,
      notes: 0,
      byCode: { 'error:6': 2, 'warning:3': 1 },
    });
    expect(log.toJSON().summary.errors).toBe(2);
  });
});

describe('renderEntry', () => {
  it('prefixes diagnostics with severity and code', () => {
    expect(renderEntry({ kind: 'diagnostic', severity: 'error', code: 6, message: 'm' })).toEqual(['ERROR #6: m']);
    expect(renderEntry({ kind: 'diagnostic', severity: 'warning', code: 4, message: 'w' })).toEqual([
      'WARNING #4: w',
    ]);
  });

  it('follows fragments with a blank line', () => {
    expect(renderEntry({ kind: 'fragment', lines: ['<a/>', '<b/>'] })).toEqual(['<a/>', '<b/>', '']);
  });

  it('renders notes as XML comments', () => {
    expect(renderEntry({ kind: 'note', message: 'hello' })).toEqual(['<!-- hello -->']);
  });

  it('keeps note comments well-formed', () => {
    expect(renderEntry({ kind: 'note', message: 'flag --force set' })).toEqual(['<!-- flag - -force set -->']);
  });
});

describe('renderReport', () => {
  it('returns null for an empty log', () => {
    expect(renderReport(new DiagnosticLog(), { branch: 'develop' })).toBeNull();
  });

  it('puts the branch header first', () => {
    const log = new DiagnosticLog();
    log.error(1, 'File x has been modified.');
    log.fragment(['<!-- frag -->']);
    log.warning(2, 'The following files are present: \n    a.txt');

    expect(renderReport(log, { branch: 'release/2.0' })).toBe(
      [
        'Current source control branch: release/2.0',
        'ERROR #1: File x has been modified.',
        '<!-- frag -->',
        '',
        'WARNING #2: The following files are present: ',
        '    a.txt',
        '',
      ].join('\n')
    );
  });

  it('omits the header when the branch is unknown', () => {
    const log = new DiagnosticLog();
    log.note('n');
    expect(renderReport(log)).toBe('<!-- n -->\n');
  });
});

describe('describeCode', () => {
  it('marks Warning 1 as no longer reported', () => {
    expect(describeCode('warning', 1)?.deprecated).toBe(true);
    expect(describeCode('error', 8)?.name).toBe('ignored-segment-only');
    expect(describeCode('error', 10)).toBeUndefined();
  });
});
