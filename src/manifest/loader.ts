/**
 * WiX manifest loading
 *
 * Parses `.wxs` documents with cheerio in XML mode and extracts the
 * component, file and feature-reference records the index needs.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, isAbsolute, resolve } from 'node:path';
import * as cheerio from 'cheerio';
import type { ManifestFileRecord, ManifestSource, ManifestSourceList, FeatureReference } from './types.js';
import { DEFAULT_MANIFEST_SOURCES } from './types.js';
import { ManifestLoadError } from '../diagnostics/errors.js';
import { xmlSyntaxError } from '../utils/xml.js';

/** Elements whose Id names the install directory of nested components */
const DIRECTORY_SELECTOR = 'Directory, DirectoryRef';

/**
 * Parse manifest XML that has already been read
 *
 * @param xml - Document text
 * @param sourcePath - Path recorded on every extracted record
 * @throws ManifestLoadError if the document is not well-formed
 */
export function parseManifestSource(xml: string, sourcePath: string): ManifestSource {
  const syntaxError = xmlSyntaxError(xml);
  if (syntaxError) {
    throw new ManifestLoadError(sourcePath, syntaxError);
  }

  const $ = cheerio.load(xml, { xmlMode: true });

  const components: ManifestSource['components'] = [];
  const files: ManifestFileRecord[] = [];
  const featureReferences: FeatureReference[] = [];

  $('Component').each((_, element) => {
    const $component = $(element);
    const id = $component.attr('Id') ?? '';
    const directoryId =
      $component.attr('Directory') ?? $component.closest(DIRECTORY_SELECTOR).attr('Id') ?? '';

    components.push({
      guid: $component.attr('Guid') ?? '',
      id,
      directoryId,
      sourcePath,
    });

    $component.children('File').each((__, fileElement) => {
      const $file = $(fileElement);
      files.push({
        id: $file.attr('Id') ?? '',
        name: $file.attr('Name') ?? '',
        longName: $file.attr('LongName') ?? '',
        source: $file.attr('Source') ?? $file.attr('src') ?? '',
        componentId: id,
        // The directory of a file is its grandparent element
        directoryId: $component.parent().attr('Id') ?? '',
        sourcePath,
      });
    });
  });

  $('FeatureRef, Feature').each((_, element) => {
    const $feature = $(element);
    const featureId = $feature.attr('Id');
    if (!featureId) return;

    const componentIds: string[] = [];
    $feature.children('ComponentRef').each((__, ref) => {
      const componentId = $(ref).attr('Id');
      if (componentId) componentIds.push(componentId);
    });

    if (componentIds.length > 0) {
      featureReferences.push({ featureId, componentIds, sourcePath });
    }
  });

  return {
    path: sourcePath,
    name: basename(sourcePath),
    components,
    files,
    featureReferences,
  };
}

/**
 * Read and parse one manifest file
 *
 * @throws ManifestLoadError if the file is missing, unreadable or empty
 */
export async function loadManifestSource(sourcePath: string): Promise<ManifestSource> {
  if (!existsSync(sourcePath)) {
    throw new ManifestLoadError(sourcePath, 'file not found');
  }

  let content: string;
  try {
    content = await readFile(sourcePath, 'utf-8');
  } catch (err) {
    throw new ManifestLoadError(sourcePath, err instanceof Error ? err.message : String(err));
  }

  return parseManifestSource(content, sourcePath);
}

/**
 * Load the installer's manifest sources in precedence order
 *
 * Mandatory sources come first, then any optional overlay that exists.
 *
 * @param installerDir - Directory holding the `.wxs` files
 * @param list - Which sources to load
 */
export async function loadManifestSources(
  installerDir: string,
  list: ManifestSourceList = DEFAULT_MANIFEST_SOURCES
): Promise<ManifestSource[]> {
  const resolvePath = (name: string): string =>
    isAbsolute(name) ? name : resolve(installerDir, name);

  const sources: ManifestSource[] = [];
  for (const name of list.mandatory) {
    sources.push(await loadManifestSource(resolvePath(name)));
  }
  for (const name of list.optional) {
    const path = resolvePath(name);
    if (existsSync(path)) {
      sources.push(await loadManifestSource(path));
    }
  }
  return sources;
}
