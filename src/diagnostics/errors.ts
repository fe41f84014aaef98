/**
 * Fatal error classes
 *
 * These abort a run before reconciliation starts. Anything that concerns a
 * single library entry is reported as a diagnostic instead.
 */

/**
 * Base error class for fatal integrity-check errors
 */
export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'IntegrityError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Thrown when the installer directory or project root cannot be resolved
 */
export class InstallerRootError extends IntegrityError {
  constructor(path: string, reason: string) {
    super(
      `Cannot resolve installer directory ${path}: ${reason}`,
      'INSTALLER_ROOT_NOT_FOUND',
      'Run from the Installer folder or pass --installer-dir <path>'
    );
    this.name = 'InstallerRootError';
  }
}

/**
 * Thrown when a mandatory manifest source is missing or cannot be parsed
 */
export class ManifestLoadError extends IntegrityError {
  constructor(
    public readonly sourcePath: string,
    reason: string
  ) {
    super(
      `Failed to load manifest source ${sourcePath}: ${reason}`,
      'MANIFEST_LOAD_ERROR',
      'Check that the WiX source exists and is well-formed XML'
    );
    this.name = 'ManifestLoadError';
  }
}

/**
 * Thrown when a library snapshot exists but cannot be read
 */
export class LibraryLoadError extends IntegrityError {
  constructor(
    public readonly libraryPath: string,
    reason: string
  ) {
    super(
      `Failed to load library snapshot ${libraryPath}: ${reason}`,
      'LIBRARY_LOAD_ERROR',
      'Restore the library file from the last release, or delete it if no release exists yet'
    );
    this.name = 'LibraryLoadError';
  }
}

/**
 * Thrown when the integrity configuration cannot be read
 */
export class ConfigError extends IntegrityError {
  constructor(configPath: string, reason: string) {
    super(
      `Failed to load configuration ${configPath}: ${reason}`,
      'CONFIG_ERROR',
      'Pass --config <file> pointing at InstallerConfig.xml or a YAML equivalent'
    );
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when git is not installed or not available
 */
export class GitNotAvailableError extends IntegrityError {
  constructor() {
    super(
      'Git is not installed or not available in PATH',
      'GIT_NOT_AVAILABLE',
      'Install git from https://git-scm.com/downloads'
    );
    this.name = 'GitNotAvailableError';
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends IntegrityError {
  constructor(
    command: string,
    public readonly stderr?: string,
    public readonly exitCode?: number
  ) {
    const details = stderr ? `: ${stderr.trim()}` : '';
    super(
      `Git command failed: ${command}${details}`,
      'GIT_COMMAND_ERROR',
      'Check your git installation and repository state'
    );
    this.name = 'GitCommandError';
  }
}

/**
 * Type guard to check if an error is an IntegrityError
 */
export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isIntegrityError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
