/**
 * Tests for corrective fragment synthesis
 */

import { describe, it, expect } from 'vitest';
import type { FileLibraryEntry, RegistryLibraryEntry } from '../../src/library/types.js';
import {
  escapeXmlAttribute,
  makeId,
  synthesizeFileFragment,
  synthesizeRegistryFragment,
} from '../../src/snippets/index.js';

// =============================================================================
// Helper Functions
// =============================================================================

function fileEntry(overrides: Partial<FileLibraryEntry> = {}): FileLibraryEntry {
  return {
    path: 'Output\\Release\\Old.dll',
    releasedDate: '',
    releasedAt: null,
    releasedVersion: '1.0.0.0',
    releasedMd5: 'ABC',
    featureList: ['Main', 'Extras'],
    componentGuid: 'GUID-OLD',
    componentId: 'OldDll',
    directoryId: 'APPFOLDER',
    longName: 'OldLibrary.dll',
    shortName: 'OLDLIB~1.DLL',
    ...overrides,
  };
}

function registryEntry(overrides: Partial<RegistryLibraryEntry> = {}): RegistryLibraryEntry {
  return {
    guid: 'GUID-REG',
    root: 'HKLM',
    keyHeader: 'Software\\Example',
    directoryId: 'APPFOLDER',
    id: 'RegKeys',
    featureList: ['Main'],
    ...overrides,
  };
}

const newGuid = (): string => 'NEW-GUID';

// =============================================================================
// File fragments
// =============================================================================

describe('synthesizeFileFragment', () => {
  it('reinstates the component and removes the file', () => {
    const removalId = makeId('DelOldLibrary.dll', 'OldDll');
    const fragment = synthesizeFileFragment(fileEntry(), undefined, { newGuid });

    expect(fragment.removalComponentId).toBe(removalId);
    expect(fragment.removalComponentGuid).toBe('NEW-GUID');
    expect(fragment.lines).toEqual([
      '<!-- File component GUID-OLD [Output\\Release\\Old.dll] is missing from (Auto)Files.wxs -->',
      '<!-- Suggested PatchCorrections.wxs snippet: -->',
      '<DirectoryRef Id="APPFOLDER">',
      '\t<Component Id="OldDll" Transitive="yes" Guid="GUID-OLD">',
      '\t\t<Condition>FALSE</Condition>',
      '\t\t<CreateFolder/>',
      '\t</Component>',
      `\t<Component Id="${removalId}" Guid="NEW-GUID">`,
      `\t\t<RemoveFile Id="${removalId}" Name="OLDLIB~1.DLL" LongName="OldLibrary.dll" On="install"/>`,
      '\t\t<CreateFolder/>',
      '\t</Component>',
      '</DirectoryRef>',
      '<FeatureRef Id="Main">',
      '\t<ComponentRef Id="OldDll"/>',
      `\t<ComponentRef Id="${removalId}"/>`,
      '</FeatureRef>',
      '<FeatureRef Id="Extras">',
      '\t<ComponentRef Id="OldDll"/>',
      `\t<ComponentRef Id="${removalId}"/>`,
      '</FeatureRef>',
    ]);
  });

  it('omits LongName when the file has a single name', () => {
    const fragment = synthesizeFileFragment(fileEntry({ longName: 'Old.dll', shortName: 'Old.dll' }), undefined, {
      newGuid,
    });
    const removalId = makeId('DelOld.dll', 'OldDll');
    expect(fragment.lines).toContain(`\t\t<RemoveFile Id="${removalId}" Name="Old.dll" On="install"/>`);
  });

  it('skips the removal component when the file is sourced elsewhere', () => {
    const fragment = synthesizeFileFragment(fileEntry({ featureList: ['Main'] }), 'DistFiles\\OldLibrary.dll', {
      newGuid,
    });
    expect(fragment.removalComponentId).toBeUndefined();
    expect(fragment.lines).toEqual([
      '<!-- File component GUID-OLD [Output\\Release\\Old.dll] is missing from (Auto)Files.wxs -->',
      '<!-- However, same file is now sourced from DistFiles\\OldLibrary.dll. -->',
      '<!-- Suggested PatchCorrections.wxs snippet: -->',
      '<DirectoryRef Id="APPFOLDER">',
      '\t<Component Id="OldDll" Transitive="yes" Guid="GUID-OLD">',
      '\t\t<Condition>FALSE</Condition>',
      '\t\t<CreateFolder/>',
      '\t</Component>',
      '</DirectoryRef>',
      '<FeatureRef Id="Main">',
      '\t<ComponentRef Id="OldDll"/>',
      '</FeatureRef>',
    ]);
  });

  it('stops after a warning when the directory is unknown', () => {
    const fragment = synthesizeFileFragment(fileEntry({ directoryId: '' }), undefined, { newGuid });
    expect(fragment.lines).toEqual([
      '<!-- File component GUID-OLD [Output\\Release\\Old.dll] is missing from (Auto)Files.wxs -->',
      '<!-- WARNING: Could not locate DirectoryId -->',
    ]);
  });

  it('warns when no features are listed', () => {
    const fragment = synthesizeFileFragment(fileEntry({ featureList: [] }), undefined, { newGuid });
    expect(fragment.lines[fragment.lines.length - 1]).toBe(
      '<!-- WARNING: No features specified for above component(s) -->'
    );
  });

  it('falls back to [unknown] for a missing component id', () => {
    const fragment = synthesizeFileFragment(fileEntry({ componentId: '' }), undefined, { newGuid });
    expect(fragment.componentId).toBe('[unknown]');
    expect(fragment.lines).toContain('\t<Component Id="[unknown]" Transitive="yes" Guid="GUID-OLD">');
  });

  it('keeps the introducing comments well-formed', () => {
    const fragment = synthesizeFileFragment(
      fileEntry({ path: 'Output\\Release\\old--x.dll' }),
      'DistFiles\\new--x.dll',
      { newGuid }
    );
    expect(fragment.lines.slice(0, 2)).toEqual([
      '<!-- File component GUID-OLD [Output\\Release\\old- -x.dll] is missing from (Auto)Files.wxs -->',
      '<!-- However, same file is now sourced from DistFiles\\new- -x.dll. -->',
    ]);
  });

  it('is deterministic apart from the new GUID', () => {
    const a = synthesizeFileFragment(fileEntry(), undefined, { newGuid });
    const b = synthesizeFileFragment(fileEntry(), undefined, { newGuid });
    expect(a.lines).toEqual(b.lines);
  });
});

// =============================================================================
// Registry fragments
// =============================================================================

describe('synthesizeRegistryFragment', () => {
  it('reinstates the component and removes the key', () => {
    const removalId = makeId('DelRegKeys', 'RegKeys');
    const fragment = synthesizeRegistryFragment(registryEntry(), { newGuid });

    expect(fragment.lines).toEqual([
      '<!-- Registry component GUID-REG [HKLM\\Software\\Example] is missing from (Auto)Files.wxs -->',
      '<!-- Suggested PatchCorrections.wxs snippet: -->',
      '<DirectoryRef Id="APPFOLDER">',
      '\t<Component Id="RegKeys" Transitive="yes" Guid="GUID-REG">',
      '\t\t<Condition>FALSE</Condition>',
      '\t\t<CreateFolder/>',
      '\t</Component>',
      `\t<Component Id="${removalId}" Guid="NEW-GUID">`,
      `\t\t<Registry Root="HKLM" Key="Software\\Example" Action="removeKeyOnInstall" Id="${removalId}"/>`,
      '\t\t<CreateFolder/>',
      '\t</Component>',
      '</DirectoryRef>',
      '<FeatureRef Id="Main">',
      '\t<ComponentRef Id="RegKeys"/>',
      `\t<ComponentRef Id="${removalId}"/>`,
      '</FeatureRef>',
    ]);
  });

  it('stops after a warning when the directory is unknown', () => {
    const fragment = synthesizeRegistryFragment(registryEntry({ directoryId: '' }), { newGuid });
    expect(fragment.lines).toHaveLength(2);
    expect(fragment.lines[1]).toBe('<!-- WARNING: Could not locate DirectoryId -->');
  });

  it('splits double hyphens in the key', () => {
    const fragment = synthesizeRegistryFragment(registryEntry({ keyHeader: 'Software\\A--B' }), { newGuid });
    expect(fragment.lines[0]).toBe(
      '<!-- Registry component GUID-REG [HKLM\\Software\\A- -B] is missing from (Auto)Files.wxs -->'
    );
    expect(fragment.lines).toContain(
      `\t\t<Registry Root="HKLM" Key="Software\\A--B" Action="removeKeyOnInstall" Id="${makeId('DelRegKeys', 'RegKeys')}"/>`
    );
  });
});

describe('escapeXmlAttribute', () => {
  it('escapes markup characters', () => {
    expect(escapeXmlAttribute('a<b>&"c"')).toBe('a&lt;b&gt;&amp;&quot;c&quot;');
  });
});
