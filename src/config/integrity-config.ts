/**
 * Integrity check configuration
 *
 * Loaded from the installer's InstallerConfig.xml:
 *
 *   <IntegrityChecks>
 *     <IgnoreNonVersionedDistFiles PathPattern="..."/>
 *     <IgnoreVersionZeroFiles PathPattern="..."/>
 *   </IntegrityChecks>
 *   <Omissions><File PathPattern="..."/></Omissions>
 *   <FailureNotification>
 *     <EmailingMachine Name="..."/>
 *     <Recipient Email="..."/>
 *   </FailureNotification>
 *
 * or from a YAML file with the same lists under `nonVersionedDistFiles`,
 * `versionZeroFiles`, `omissions` and `notification`.
 * Patterns are case-insensitive path substrings and may contain `${config}`.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import * as cheerio from 'cheerio';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../diagnostics/errors.js';
import { xmlSyntaxError } from '../utils/xml.js';

// =============================================================================
// Types
// =============================================================================

export interface NotificationConfig {
  /** Hosts that mail the report instead of showing it */
  emailingMachines: string[];
  recipients: string[];
}

export interface IntegrityConfig {
  /** Files allowed in DistFiles without being under source control */
  nonVersionedDistFiles: string[];
  /** Files allowed to carry version 0.0.0.0 */
  versionZeroFiles: string[];
  /** Files left out of the installer entirely */
  omissions: string[];
  notification: NotificationConfig;
}

/** Configuration file looked up in the installer directory */
export const DEFAULT_CONFIG_FILE = 'InstallerConfig.xml';

export const EMPTY_CONFIG: IntegrityConfig = {
  nonVersionedDistFiles: [],
  versionZeroFiles: [],
  omissions: [],
  notification: { emailingMachines: [], recipients: [] },
};

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse InstallerConfig.xml content
 */
export function parseXmlConfig(xml: string): IntegrityConfig {
  const syntaxError = xmlSyntaxError(xml);
  if (syntaxError) {
    throw new Error(syntaxError);
  }
  const $ = cheerio.load(xml, { xmlMode: true });

  const collect = (selector: string, attribute: string): string[] => {
    const values: string[] = [];
    $(selector).each((_, element) => {
      const value = $(element).attr(attribute);
      // An empty pattern would match every path
      if (value) values.push(value);
    });
    return values;
  };

  return {
    nonVersionedDistFiles: collect('IntegrityChecks > IgnoreNonVersionedDistFiles', 'PathPattern'),
    versionZeroFiles: collect('IntegrityChecks > IgnoreVersionZeroFiles', 'PathPattern'),
    omissions: collect('Omissions > File', 'PathPattern'),
    notification: {
      emailingMachines: collect('FailureNotification > EmailingMachine', 'Name'),
      recipients: collect('FailureNotification > Recipient', 'Email'),
    },
  };
}

function stringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`${field} must be a list of strings`);
  }
  return value.filter((item) => item.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML configuration content
 */
export function parseYamlConfig(content: string): IntegrityConfig {
  const raw: unknown = parseYaml(content) ?? {};
  if (!isRecord(raw)) {
    throw new Error('configuration must be a mapping');
  }
  const notification = raw.notification ?? {};
  if (!isRecord(notification)) {
    throw new Error('notification must be a mapping');
  }

  return {
    nonVersionedDistFiles: stringList(raw.nonVersionedDistFiles, 'nonVersionedDistFiles'),
    versionZeroFiles: stringList(raw.versionZeroFiles, 'versionZeroFiles'),
    omissions: stringList(raw.omissions, 'omissions'),
    notification: {
      emailingMachines: stringList(notification.emailingMachines, 'notification.emailingMachines'),
      recipients: stringList(notification.recipients, 'notification.recipients'),
    },
  };
}

/**
 * Load configuration, choosing the parser by file extension
 *
 * @throws ConfigError if the file is missing or invalid
 */
export async function loadIntegrityConfig(configPath: string): Promise<IntegrityConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigError(configPath, 'file not found');
  }

  try {
    const content = await readFile(configPath, 'utf-8');
    const ext = extname(configPath).toLowerCase();
    return ext === '.yaml' || ext === '.yml' ? parseYamlConfig(content) : parseXmlConfig(content);
  } catch (err) {
    throw new ConfigError(configPath, err instanceof Error ? err.message : String(err));
  }
}

/**
 * True when this host is configured to mail the report
 */
export function isEmailingMachine(config: IntegrityConfig, hostname: string): boolean {
  const host = hostname.toLowerCase();
  return config.notification.emailingMachines.some((name) => name.toLowerCase() === host);
}
