/**
 * Shared types and interfaces for the installer-integrity CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for commands
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command execution context
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
