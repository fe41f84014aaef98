/**
 * Reconciliation engine
 *
 * Walks the library snapshot against the manifest index and the files on
 * disk and collects everything worth reporting into a DiagnosticLog.
 * Per-entry work runs on a bounded pool; each entry's results are kept
 * apart and appended in snapshot order, so the report does not depend on
 * which probe finishes first.
 */

import type { IntegrityConfig } from '../config/integrity-config.js';
import type { FileLibraryEntry, LibrarySnapshot } from '../library/types.js';
import { FILE_LIBRARY_NAME, REGISTRY_LIBRARY_NAME } from '../library/types.js';
import { describeIssues } from '../library/loader.js';
import type { ManifestIndex } from '../manifest/manifest-index.js';
import type { FileProbe } from '../probes/file-probe.js';
import { probeFile } from '../probes/file-probe.js';
import type { UntrackedQuery } from '../source-control/git.js';
import type { GuidGenerator } from '../snippets/identifiers.js';
import { DiagnosticLog, type LogEntry } from '../diagnostics/log.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { matchesAnyPattern } from '../utils/paths.js';
import { checkFeatureMembership, checkFileDetails, checkFilePresence } from './files/checks.js';
import { checkRegistryPresence } from './registry/checks.js';
import { checkUntrackedFiles } from './untracked.js';
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from './pool.js';

// =============================================================================
// Types
// =============================================================================

export interface ReconcileInput {
  manifest: ManifestIndex;
  library: LibrarySnapshot;
  config: IntegrityConfig;
  projectRoot: string;
  buildType: string;
  /** Result of the DistFiles query; the check is skipped when absent */
  untracked?: UntrackedQuery;
}

export interface ReconcileOptions {
  /** File system probe (default: probeFile) */
  probe?: FileProbe;
  /** Maximum entries checked at once (default: 8) */
  concurrency?: number;
  /** GUID source for corrective fragments */
  newGuid?: GuidGenerator;
  logger?: Logger;
}

// =============================================================================
// Engine
// =============================================================================

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function reconcile(input: ReconcileInput, options: ReconcileOptions = {}): Promise<DiagnosticLog> {
  const { manifest, library, config, projectRoot, buildType } = input;
  const probe = options.probe ?? probeFile;
  const log = options.logger ?? defaultLogger;
  const synth = { newGuid: options.newGuid };
  const result = new DiagnosticLog();

  for (const [table, name] of [
    [library.files, FILE_LIBRARY_NAME],
    [library.registry, REGISTRY_LIBRARY_NAME],
  ] as const) {
    if (!table) continue;
    const issues = describeIssues(table, name);
    if (issues) {
      log.warn(issues);
      result.note(issues);
    }
  }

  const fileEntries = (library.files?.entries ?? []).filter((entry) => {
    const omitted = matchesAnyPattern(entry.path, config.omissions, buildType);
    if (omitted) log.debug('Skipping omitted library entry', { path: entry.path });
    return !omitted;
  });

  const checkFile = async (entry: FileLibraryEntry): Promise<LogEntry[]> => {
    const entries: LogEntry[] = [
      ...checkFilePresence(entry, manifest, synth),
      ...checkFeatureMembership(entry, manifest),
    ];
    try {
      entries.push(
        ...(await checkFileDetails(entry, {
          projectRoot,
          buildType,
          versionZeroFiles: config.versionZeroFiles,
          probe,
        }))
      );
    } catch (err) {
      log.error(`Detail check failed for ${entry.path}`, err instanceof Error ? err : undefined);
      entries.push({ kind: 'note', message: `Could not check file ${entry.path}: ${describeFailure(err)}` });
    }
    return entries;
  };

  log.debug('Checking file library', { entries: fileEntries.length });
  const perFile = await mapWithConcurrency(
    fileEntries,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    (entry) => checkFile(entry)
  );
  for (const entries of perFile) {
    result.append(...entries);
  }

  const registryEntries = library.registry?.entries ?? [];
  log.debug('Checking registry library', { entries: registryEntries.length });
  for (const entry of registryEntries) {
    result.append(...checkRegistryPresence(entry, manifest, synth));
  }

  if (input.untracked) {
    result.append(...checkUntrackedFiles(input.untracked, config, buildType));
  }

  const summary = result.summary();
  log.debug('Reconciliation complete', {
    errors: summary.errors,
    warnings: summary.warnings,
    fragments: summary.fragments,
  });
  return result;
}
