/**
 * Corrective fragment synthesis
 *
 * When a component from a previous release has vanished from the
 * manifest, a patch cannot simply drop it. The suggested
 * PatchCorrections.wxs snippet:
 *
 * 1. reinstates the component with `Transitive="yes"` and a FALSE
 *    condition, so the patch re-evaluates it and then leaves it out;
 * 2. adds a new component that removes the leftover file or registry key
 *    on install (unless the file is still shipped from another source);
 * 3. wires both components into every feature the library listed.
 *
 * `<CreateFolder/>` is there so each component has a key path (ICE18).
 */

import type { FileLibraryEntry, RegistryLibraryEntry } from '../library/types.js';
import { makeId, randomGuid, type GuidGenerator } from './identifiers.js';
import { escapeXmlComment } from '../utils/xml.js';

// =============================================================================
// Types
// =============================================================================

export interface CorrectiveFragment {
  kind: 'file' | 'registry';
  /** GUID of the orphaned component */
  componentGuid: string;
  /** Id of the orphaned component (`[unknown]` when the library had none) */
  componentId: string;
  directoryId: string;
  /** Where the same file is now sourced from, if anywhere */
  duplicateSource?: string;
  /** Id minted for the removal component */
  removalComponentId?: string;
  /** GUID minted for the removal component */
  removalComponentGuid?: string;
  featureIds: string[];
  /** Complete snippet, comments included, one line per element */
  lines: string[];
}

export interface SynthesizeOptions {
  /** GUID source for removal components (default: random) */
  newGuid?: GuidGenerator;
}

/** Stand-in when the library did not record a component Id */
export const UNKNOWN_COMPONENT_ID = '[unknown]';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Escape a value for use inside a double-quoted XML attribute
 */
export function escapeXmlAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const q = escapeXmlAttribute;
const c = escapeXmlComment;

function disabledComponentLines(componentId: string, guid: string): string[] {
  return [
    `\t<Component Id="${q(componentId)}" Transitive="yes" Guid="${q(guid)}">`,
    '\t\t<Condition>FALSE</Condition>',
    '\t\t<CreateFolder/>',
    '\t</Component>',
  ];
}

function featureWiringLines(featureIds: readonly string[], componentIds: string[]): string[] {
  if (featureIds.length === 0) {
    return ['<!-- WARNING: No features specified for above component(s) -->'];
  }
  const lines: string[] = [];
  for (const featureId of featureIds) {
    lines.push(`<FeatureRef Id="${q(featureId)}">`);
    for (const componentId of componentIds) {
      lines.push(`\t<ComponentRef Id="${q(componentId)}"/>`);
    }
    lines.push('</FeatureRef>');
  }
  return lines;
}

// =============================================================================
// Synthesis
// =============================================================================

/**
 * Fragment retiring an orphaned file component
 *
 * @param entry - Library entry whose component GUID is gone from the manifest
 * @param duplicateSource - Source of a same-named file installed to the same
 *   directory, from `ManifestIndex.findFileElsewhere`
 */
export function synthesizeFileFragment(
  entry: FileLibraryEntry,
  duplicateSource: string | undefined,
  options: SynthesizeOptions = {}
): CorrectiveFragment {
  const newGuid = options.newGuid ?? randomGuid;
  const componentId = entry.componentId || UNKNOWN_COMPONENT_ID;
  const fragment: CorrectiveFragment = {
    kind: 'file',
    componentGuid: entry.componentGuid,
    componentId,
    directoryId: entry.directoryId,
    duplicateSource,
    featureIds: [...entry.featureList],
    lines: [`<!-- File component ${c(entry.componentGuid)} [${c(entry.path)}] is missing from (Auto)Files.wxs -->`],
  };

  if (duplicateSource !== undefined) {
    fragment.lines.push(`<!-- However, same file is now sourced from ${c(duplicateSource)}. -->`);
  }

  if (!entry.directoryId) {
    fragment.lines.push('<!-- WARNING: Could not locate DirectoryId -->');
    return fragment;
  }

  fragment.lines.push('<!-- Suggested PatchCorrections.wxs snippet: -->');
  fragment.lines.push(`<DirectoryRef Id="${q(entry.directoryId)}">`);
  fragment.lines.push(...disabledComponentLines(componentId, entry.componentGuid));

  const wired = [componentId];
  if (duplicateSource === undefined) {
    const fileName = entry.longName || entry.shortName;
    const removalId = makeId(`Del${fileName}`, componentId);
    const removalGuid = newGuid();
    fragment.removalComponentId = removalId;
    fragment.removalComponentGuid = removalGuid;
    wired.push(removalId);

    const shortName = entry.shortName || entry.longName;
    let nameSection = ` Name="${q(shortName)}"`;
    if (entry.longName && entry.longName !== shortName) {
      nameSection += ` LongName="${q(entry.longName)}"`;
    }

    fragment.lines.push(
      `\t<Component Id="${q(removalId)}" Guid="${q(removalGuid)}">`,
      `\t\t<RemoveFile Id="${q(removalId)}"${nameSection} On="install"/>`,
      '\t\t<CreateFolder/>',
      '\t</Component>'
    );
  }

  fragment.lines.push('</DirectoryRef>');
  fragment.lines.push(...featureWiringLines(entry.featureList, wired));
  return fragment;
}

/**
 * Fragment retiring an orphaned registry component
 */
export function synthesizeRegistryFragment(
  entry: RegistryLibraryEntry,
  options: SynthesizeOptions = {}
): CorrectiveFragment {
  const newGuid = options.newGuid ?? randomGuid;
  const componentId = entry.id || UNKNOWN_COMPONENT_ID;
  const fragment: CorrectiveFragment = {
    kind: 'registry',
    componentGuid: entry.guid,
    componentId,
    directoryId: entry.directoryId,
    featureIds: [...entry.featureList],
    lines: [
      `<!-- Registry component ${c(entry.guid)} [${c(`${entry.root}\\${entry.keyHeader}`)}] is missing from (Auto)Files.wxs -->`,
    ],
  };

  if (!entry.directoryId) {
    fragment.lines.push('<!-- WARNING: Could not locate DirectoryId -->');
    return fragment;
  }

  const removalId = makeId(`Del${componentId}`, componentId);
  const removalGuid = newGuid();
  fragment.removalComponentId = removalId;
  fragment.removalComponentGuid = removalGuid;

  fragment.lines.push(
    '<!-- Suggested PatchCorrections.wxs snippet: -->',
    `<DirectoryRef Id="${q(entry.directoryId)}">`,
    ...disabledComponentLines(componentId, entry.guid),
    `\t<Component Id="${q(removalId)}" Guid="${q(removalGuid)}">`,
    `\t\t<Registry Root="${q(entry.root)}" Key="${q(entry.keyHeader)}" Action="removeKeyOnInstall" Id="${q(removalId)}"/>`,
    '\t\t<CreateFolder/>',
    '\t</Component>',
    '</DirectoryRef>',
    ...featureWiringLines(entry.featureList, [componentId, removalId])
  );
  return fragment;
}
