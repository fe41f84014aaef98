/**
 * check command - Reconcile the installer against the last release
 */

import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { hostname as osHostname } from 'node:os';
import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printEntries, success, verbose, warn } from '../utils/output.js';
import { logger } from '../utils/logger.js';
import { resolveEnvironment } from '../config/environment.js';
import {
  EMPTY_CONFIG,
  isEmailingMachine,
  loadIntegrityConfig,
  type IntegrityConfig,
} from '../config/integrity-config.js';
import { loadManifestSources } from '../manifest/loader.js';
import { ManifestIndex } from '../manifest/manifest-index.js';
import { loadLibrarySnapshot } from '../library/loader.js';
import { reconcile } from '../reconcilers/engine.js';
import { execGit, getCurrentBranch, listUntrackedFiles, type GitRunner, type UntrackedQuery } from '../source-control/git.js';
import type { FileProbe } from '../probes/file-probe.js';
import type { GuidGenerator } from '../snippets/identifiers.js';
import type { LogEntry, LogSummary } from '../diagnostics/log.js';
import { renderReport } from '../diagnostics/report.js';

export interface CheckOptions {
  installerDir?: string;
  projectRoot?: string;
  buildType?: string;
  /** Configuration file; when omitted InstallerConfig.xml is used if present */
  config?: string;
  /** Report file name or path, relative to the installer directory */
  report?: string;
  concurrency?: number;
  skipUntracked?: boolean;
  /** Exit non-zero when errors are found (default: true) */
  fail?: boolean;
  /** Do not print the report */
  silent?: boolean;
  /** Working directory for relative paths */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  probe?: FileProbe;
  git?: GitRunner;
  hostname?: string;
  newGuid?: GuidGenerator;
}

export interface CheckResult {
  installerDir: string;
  projectRoot: string;
  buildType: string;
  branch?: string;
  /** Where the report was written, or null when there was nothing to report */
  reportPath: string | null;
  summary: LogSummary;
  entries: readonly LogEntry[];
  /** Recipients to mail the report to, when this host is an emailing machine */
  notify?: string[];
}

async function loadConfig(configPath: string, explicit: boolean, isVerbose: boolean): Promise<IntegrityConfig> {
  if (!explicit && !existsSync(configPath)) {
    verbose(`No configuration at ${configPath}; using defaults`, isVerbose);
    return EMPTY_CONFIG;
  }
  return loadIntegrityConfig(configPath);
}

/**
 * Execute the check command
 */
export async function checkCommand(
  ctx: CommandContext,
  options: CheckOptions = {}
): Promise<CommandResult<CheckResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  const git = options.git ?? execGit;

  verbose('Executing check command', globalOpts.verbose);

  const env = resolveEnvironment({
    installerDir: options.installerDir,
    projectRoot: options.projectRoot,
    buildType: options.buildType,
    configPath: options.config,
    reportPath: options.report,
    cwd: options.cwd,
    env: options.env,
  });
  verbose(`Installer directory: ${env.installerDir}`, globalOpts.verbose);
  verbose(`Project root: ${env.projectRoot}`, globalOpts.verbose);
  verbose(`Build type: ${env.buildType}`, globalOpts.verbose);

  if (outputFormat === 'human' && !options.silent) {
    header('Installer Integrity');
    info(`Checking ${env.installerDir} against the last release...`);
  }

  // A report left over from an earlier run must not be mistaken for this one,
  // even when this run stops on a fatal error
  await rm(env.reportPath, { force: true });

  const config = await loadConfig(env.configPath, options.config !== undefined, globalOpts.verbose);
  const sources = await loadManifestSources(env.installerDir);
  verbose(`Loaded manifest sources: ${sources.map((s) => s.name).join(', ')}`, globalOpts.verbose);

  const manifest = ManifestIndex.build(sources, { projectRoot: env.projectRoot });
  const library = await loadLibrarySnapshot(env.installerDir);
  if (!library.files) {
    verbose('No FileLibrary.xml; nothing released yet', globalOpts.verbose);
  }

  let untracked: UntrackedQuery | undefined;
  if (options.skipUntracked) {
    verbose('Skipping DistFiles source control check', globalOpts.verbose);
  } else if (!existsSync(env.distFilesDir)) {
    verbose(`No DistFiles folder at ${env.distFilesDir}`, globalOpts.verbose);
  } else {
    untracked = listUntrackedFiles(env.distFilesDir, git);
  }

  const log = await reconcile(
    { manifest, library, config, projectRoot: env.projectRoot, buildType: env.buildType, untracked },
    { probe: options.probe, concurrency: options.concurrency, newGuid: options.newGuid, logger }
  );

  const branch = getCurrentBranch(env.projectRoot, git);

  const report = renderReport(log, { branch });
  if (report !== null) {
    await writeFile(env.reportPath, report, 'utf-8');
  }

  const summary = log.summary();
  const notify =
    report !== null && isEmailingMachine(config, options.hostname ?? osHostname())
      ? [...config.notification.recipients]
      : undefined;

  if (outputFormat === 'human' && !options.silent) {
    if (report === null) {
      success('No integrity problems found');
    } else {
      if (branch) console.log(`Current source control branch: ${branch}`);
      printEntries(log.all());
      info(`Report written to ${env.reportPath}`);
      if (notify) {
        warn(`Report should be mailed to: ${notify.join(', ')}`);
      }
    }
  }

  const failing = summary.errors > 0 && options.fail !== false;
  return {
    success: !failing,
    message:
      report === null
        ? 'No integrity problems found'
        : `${summary.errors} error(s), ${summary.warnings} warning(s), ${summary.fragments} corrective fragment(s)`,
    data: {
      installerDir: env.installerDir,
      projectRoot: env.projectRoot,
      buildType: env.buildType,
      branch,
      reportPath: report === null ? null : env.reportPath,
      summary,
      entries: log.all(),
      notify,
    },
  };
}
