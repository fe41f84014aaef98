/**
 * Run environment resolution
 *
 * Works out where the installer sources live, where the project root is
 * and which build flavor is being checked. Priority for each setting:
 * CLI flag, then environment variable, then default.
 */

import { existsSync, statSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import { InstallerRootError } from '../diagnostics/errors.js';
import { DEFAULT_CONFIG_FILE } from './integrity-config.js';

/** Environment variable names */
export const ENV_INSTALLER_DIR = 'INSTALLER_INTEGRITY_DIR';
export const ENV_PROJECT_ROOT = 'INSTALLER_INTEGRITY_ROOT';
export const ENV_BUILD_TYPE = 'INSTALLER_BUILD_TYPE';

export const DEFAULT_BUILD_TYPE = 'Release';

/** Folder under the project root that holds hand-maintained distributable files */
export const DIST_FILES_DIR = 'DistFiles';

/** Report file written to the installer directory */
export const REPORT_FILE_NAME = 'TestInstallerIntegrity.log';

export interface EnvironmentOptions {
  installerDir?: string;
  projectRoot?: string;
  buildType?: string;
  configPath?: string;
  reportPath?: string;
  /** Working directory (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface RunEnvironment {
  /** Directory holding the .wxs sources, libraries and config */
  installerDir: string;
  /** Root that library paths are relative to */
  projectRoot: string;
  /** Substituted for `${config}` */
  buildType: string;
  configPath: string;
  reportPath: string;
  distFilesDir: string;
}

/**
 * Project root for an installer directory
 *
 * The installer lives in `<root>/Installer`; when run from anywhere else
 * the directory itself is taken as the root.
 */
export function deriveProjectRoot(installerDir: string): string {
  return basename(installerDir).toLowerCase().endsWith('installer') ? dirname(installerDir) : installerDir;
}

/**
 * Resolve the run environment
 *
 * @throws InstallerRootError if the installer directory does not exist
 */
export function resolveEnvironment(options: EnvironmentOptions = {}): RunEnvironment {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const installerDir = resolve(cwd, options.installerDir ?? env[ENV_INSTALLER_DIR] ?? '.');
  if (!existsSync(installerDir)) {
    throw new InstallerRootError(installerDir, 'directory does not exist');
  }
  if (!statSync(installerDir).isDirectory()) {
    throw new InstallerRootError(installerDir, 'not a directory');
  }

  const rootOverride = options.projectRoot ?? env[ENV_PROJECT_ROOT];
  const projectRoot = rootOverride ? resolve(cwd, rootOverride) : deriveProjectRoot(installerDir);
  if (!existsSync(projectRoot)) {
    throw new InstallerRootError(projectRoot, 'project root does not exist');
  }

  return {
    installerDir,
    projectRoot,
    buildType: options.buildType ?? env[ENV_BUILD_TYPE] ?? DEFAULT_BUILD_TYPE,
    configPath: resolve(installerDir, options.configPath ?? DEFAULT_CONFIG_FILE),
    reportPath: resolve(installerDir, options.reportPath ?? REPORT_FILE_NAME),
    distFilesDir: resolve(projectRoot, DIST_FILES_DIR),
  };
}
