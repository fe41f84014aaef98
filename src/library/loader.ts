/**
 * Library snapshot loading
 *
 * Reads FileLibrary.xml and RegLibrary.xml into typed entries. Entries
 * are validated here, once, and problems are collected as issues rather
 * than thrown: a malformed entry should not stop the rest of the check.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import * as cheerio from 'cheerio';
import type {
  FileLibraryEntry,
  LibraryIssue,
  LibrarySnapshot,
  LibraryTable,
  RegistryLibraryEntry,
} from './types.js';
import { FILE_LIBRARY_NAME, REGISTRY_LIBRARY_NAME } from './types.js';
import { parseLibraryDate } from './dates.js';
import { LibraryLoadError } from '../diagnostics/errors.js';
import { tryEncodeVersion } from '../version/index.js';
import { xmlSyntaxError } from '../utils/xml.js';

/**
 * Split a comma-separated FeatureList attribute
 */
export function parseFeatureList(value: string): string[] {
  return value
    .split(',')
    .map((feature) => feature.trim())
    .filter((feature) => feature.length > 0);
}

function loadDocument(xml: string, path: string): cheerio.CheerioAPI {
  const syntaxError = xmlSyntaxError(xml);
  if (syntaxError) {
    throw new LibraryLoadError(path, syntaxError);
  }
  return cheerio.load(xml, { xmlMode: true });
}

/**
 * Parse FileLibrary.xml content
 *
 * @throws LibraryLoadError if the document is not well-formed
 */
export function parseFileLibrary(xml: string, path: string): LibraryTable<FileLibraryEntry> {
  const $ = loadDocument(xml, path);
  const entries: FileLibraryEntry[] = [];
  const issues: LibraryIssue[] = [];

  $('FileLibrary > File').each((index, element) => {
    const $file = $(element);
    const attr = (name: string): string => $file.attr(name) ?? '';

    const entry: FileLibraryEntry = {
      path: attr('Path'),
      releasedDate: attr('Date'),
      releasedAt: parseLibraryDate(attr('Date')),
      releasedVersion: attr('Version'),
      releasedMd5: attr('MD5'),
      featureList: parseFeatureList(attr('FeatureList')),
      componentGuid: attr('ComponentGuid'),
      componentId: attr('ComponentId'),
      directoryId: attr('DirectoryId'),
      longName: attr('LongName'),
      shortName: attr('ShortName'),
    };
    entries.push(entry);

    const subject = entry.path || entry.longName || entry.componentGuid;
    if (!entry.path) {
      issues.push({ position: index + 1, subject, reason: 'no Path attribute' });
    }
    if (!entry.componentGuid) {
      issues.push({ position: index + 1, subject, reason: 'no ComponentGuid attribute' });
    }
    if (entry.releasedDate && !entry.releasedAt) {
      issues.push({ position: index + 1, subject, reason: `unparseable Date "${entry.releasedDate}"` });
    }
    if (entry.releasedVersion) {
      const version = tryEncodeVersion(entry.releasedVersion);
      if (!version.ok) {
        issues.push({ position: index + 1, subject, reason: version.error.message });
      }
    }
  });

  return { path, entries, issues };
}

/**
 * Parse RegLibrary.xml content
 *
 * @throws LibraryLoadError if the document is not well-formed
 */
export function parseRegistryLibrary(xml: string, path: string): LibraryTable<RegistryLibraryEntry> {
  const $ = loadDocument(xml, path);
  const entries: RegistryLibraryEntry[] = [];
  const issues: LibraryIssue[] = [];

  $('RegLibrary > Component').each((index, element) => {
    const $component = $(element);
    const attr = (name: string): string => $component.attr(name) ?? '';

    const entry: RegistryLibraryEntry = {
      guid: attr('ComponentGuid') || attr('Guid'),
      root: attr('Root'),
      keyHeader: attr('KeyHeader'),
      directoryId: attr('DirectoryId'),
      id: attr('Id'),
      featureList: parseFeatureList(attr('FeatureList')),
    };
    entries.push(entry);

    if (!entry.guid) {
      issues.push({
        position: index + 1,
        subject: `${entry.root}\\${entry.keyHeader}`,
        reason: 'no ComponentGuid attribute',
      });
    }
  });

  return { path, entries, issues };
}

async function readLibrary(path: string): Promise<string | undefined> {
  if (!existsSync(path)) {
    return undefined;
  }
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new LibraryLoadError(path, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Load both libraries from the installer directory
 *
 * A missing library is not an error: before the first release there is
 * nothing to compare against.
 */
export async function loadLibrarySnapshot(installerDir: string): Promise<LibrarySnapshot> {
  const snapshot: LibrarySnapshot = {};

  const filePath = resolve(installerDir, FILE_LIBRARY_NAME);
  const fileXml = await readLibrary(filePath);
  if (fileXml !== undefined) {
    snapshot.files = parseFileLibrary(fileXml, filePath);
  }

  const registryPath = resolve(installerDir, REGISTRY_LIBRARY_NAME);
  const registryXml = await readLibrary(registryPath);
  if (registryXml !== undefined) {
    snapshot.registry = parseRegistryLibrary(registryXml, registryPath);
  }

  return snapshot;
}

/**
 * One-line summary of a table's issues, or undefined when it has none
 */
export function describeIssues(table: LibraryTable<unknown>, name: string): string | undefined {
  if (table.issues.length === 0) return undefined;
  const details = table.issues
    .map((issue) => `entry ${issue.position}${issue.subject ? ` (${issue.subject})` : ''}: ${issue.reason}`)
    .join('; ');
  return `${name} has ${table.issues.length} malformed entr${table.issues.length === 1 ? 'y' : 'ies'}: ${details}`;
}
