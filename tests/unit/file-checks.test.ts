/**
 * Tests for the per-entry file checks
 *
 * Covers:
 * - Presence: corrective fragment for a vanished component
 * - Feature membership: Errors 3, 4 and 5
 * - Detail: Errors 1, 2, 6, 7, 8, 9 and Warning 3
 */

import { describe, it, expect, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { FileLibraryEntry } from '../../src/library/types.js';
import type { FileFacts, FileProbe } from '../../src/probes/file-probe.js';
import { ManifestIndex, parseManifestSource } from '../../src/manifest/index.js';
import {
  checkFeatureMembership,
  checkFileDetails,
  checkFilePresence,
  type DetailCheckContext,
} from '../../src/reconcilers/files/checks.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const PROJECT_ROOT = join(tmpdir(), 'integrity-project');
const RELEASED_AT = new Date(2012, 2, 14, 22, 5);

const MANIFEST = `<Wix>
  <DirectoryRef Id="APPFOLDER">
    <Component Id="CoreDll" Guid="{44444444-0000-0000-0000-000000000001}">
      <File Id="CoreDllFile" Name="Core.dll" Source="Output\\Release\\Core.dll"/>
    </Component>
    <Component Id="NewHome" Guid="44444444-0000-0000-0000-000000000002">
      <File Id="MovedFile" Name="Moved.txt" Source="DistFiles\\Moved.txt"/>
    </Component>
  </DirectoryRef>
  <FeatureRef Id="Main">
    <ComponentRef Id="CoreDll"/>
  </FeatureRef>
  <FeatureRef Id="Samples">
    <ComponentRef Id="CoreDll"/>
  </FeatureRef>
</Wix>`;

function manifest(): ManifestIndex {
  return ManifestIndex.build([parseManifestSource(MANIFEST, 'Files.wxs')]);
}

function entry(overrides: Partial<FileLibraryEntry> = {}): FileLibraryEntry {
  return {
    path: 'Output\\${config}\\Core.dll',
    releasedDate: '3/14/2012 10:05 PM',
    releasedAt: RELEASED_AT,
    releasedVersion: '1.2.3.4',
    releasedMd5: 'AAAA',
    featureList: ['Main', 'Samples'],
    componentGuid: '44444444-0000-0000-0000-000000000001',
    componentId: 'CoreDll',
    directoryId: 'APPFOLDER',
    longName: 'Core.dll',
    shortName: 'Core.dll',
    ...overrides,
  };
}

function facts(overrides: Partial<FileFacts> = {}): FileFacts {
  return { md5: 'AAAA', version: '1.2.3.4', modifiedAt: RELEASED_AT, ...overrides };
}

function context(probe: FileProbe, versionZeroFiles: string[] = []): DetailCheckContext {
  return { projectRoot: PROJECT_ROOT, buildType: 'Release', versionZeroFiles, probe };
}

async function details(current: Partial<FileFacts>, library: Partial<FileLibraryEntry> = {}) {
  return checkFileDetails(entry(library), context(async () => facts(current)));
}

const SUBJECT = 'Output\\${config}\\Core.dll';

// =============================================================================
// Presence
// =============================================================================

describe('checkFilePresence', () => {
  it('returns nothing when the component is still present', () => {
    expect(checkFilePresence(entry(), manifest())).toEqual([]);
  });

  it('emits a fragment when the component is gone', () => {
    const result = checkFilePresence(
      entry({ componentGuid: '44444444-0000-0000-0000-0000000000FF', componentId: 'Gone' }),
      manifest(),
      { newGuid: () => 'NEW-GUID' }
    );
    expect(result).toHaveLength(1);
    expect(result[0]?.kind).toBe('fragment');
    expect(result[0]?.lines[0]).toBe(
      '<!-- File component 44444444-0000-0000-0000-0000000000FF [Output\\${config}\\Core.dll] is missing from (Auto)Files.wxs -->'
    );
  });

  it('notes where a moved file is now sourced from', () => {
    const result = checkFilePresence(
      entry({ componentGuid: 'OLD', componentId: 'OldMoved', longName: 'Moved.txt', shortName: 'Moved.txt' }),
      manifest()
    );
    expect(result[0]?.lines[1]).toBe('<!-- However, same file is now sourced from DistFiles\\Moved.txt. -->');
  });

  it('skips entries without a GUID', () => {
    expect(checkFilePresence(entry({ componentGuid: '' }), manifest())).toEqual([]);
  });
});

// =============================================================================
// Feature membership
// =============================================================================

describe('checkFeatureMembership', () => {
  it('returns nothing when features match', () => {
    expect(checkFeatureMembership(entry(), manifest())).toEqual([]);
  });

  it('reports Error 3 for an empty feature list', () => {
    expect(checkFeatureMembership(entry({ featureList: [] }), manifest())).toEqual([
      {
        kind: 'diagnostic',
        severity: 'error',
        code: 3,
        message: `Library contains file ${SUBJECT} with no FeatureList attribute.`,
        subject: SUBJECT,
      },
    ]);
  });

  it('reports Error 4 for features added in the manifest', () => {
    const [diagnostic] = checkFeatureMembership(entry({ featureList: ['Main'] }), manifest());
    expect(diagnostic?.code).toBe(4);
    expect(diagnostic?.message).toBe(
      `File ${SUBJECT} has been added to the following features since the last release: Samples. Patching will fail.`
    );
  });

  it('reports Error 5 for features dropped from the manifest', () => {
    const [diagnostic] = checkFeatureMembership(
      entry({ featureList: ['Main', 'Samples', 'Legacy', 'Extras'] }),
      manifest()
    );
    expect(diagnostic?.code).toBe(5);
    expect(diagnostic?.message).toBe(
      `File ${SUBJECT} has been removed from the following features since the last release: Legacy, Extras. Patching will fail.`
    );
  });

  it('reports both directions at once', () => {
    const result = checkFeatureMembership(entry({ featureList: ['Main', 'Legacy'] }), manifest());
    expect(result.map((d) => d.code)).toEqual([4, 5]);
  });

  it('returns nothing when the component is not in the manifest', () => {
    expect(checkFeatureMembership(entry({ componentGuid: 'MISSING' }), manifest())).toEqual([]);
  });
});

// =============================================================================
// Detail
// =============================================================================

describe('checkFileDetails', () => {
  it('probes the path with the build type substituted', async () => {
    const probe = vi.fn<FileProbe>(async () => null);
    const result = await checkFileDetails(entry(), context(probe));
    expect(result).toEqual([]);
    expect(probe).toHaveBeenCalledWith(join(PROJECT_ROOT, 'Output', 'Release', 'Core.dll'));
  });

  it('returns nothing for an unchanged file', async () => {
    expect(await details({})).toEqual([]);
  });

  it('treats MD5 case differences as equal', async () => {
    expect(await details({ md5: 'aaaa' })).toEqual([]);
  });

  it('reports Error 1 when content changed but the version did not', async () => {
    const result = await details({ md5: 'BBBB' });
    expect(result).toEqual([
      {
        kind: 'diagnostic',
        severity: 'error',
        code: 1,
        message: `File ${SUBJECT} has been modified since the last release, but its version remains at 1.2.3.4. Patching will fail.`,
        subject: SUBJECT,
      },
    ]);
  });

  it('reports Error 8 when only the 4th segment changed', async () => {
    const result = await details({ md5: 'BBBB', version: '1.2.3.9' });
    expect(result.map((d) => d.code)).toEqual([8]);
    expect(result[0]?.message).toBe(
      `File ${SUBJECT} has a version number (1.2.3.9) that has only changed in the 4th segment since the last release (1.2.3.4). The 4th version segment is ignored by the installer. Patching will fail.`
    );
  });

  it('does not report Error 8 when the content is unchanged', async () => {
    expect(await details({ version: '1.2.3.9' })).toEqual([]);
  });

  it('reports Error 6 when the version went down', async () => {
    const result = await details({ md5: 'BBBB', version: '1.2.2.0' });
    expect(result.map((d) => d.code)).toEqual([6]);
    expect(result[0]?.message).toBe(
      `File ${SUBJECT} had a version of 1.2.3.4 in the last release. The version has since been lowered to 1.2.2.0. Patching will fail.`
    );
  });

  it('reports Error 6 for a lowered third segment with a higher fourth', async () => {
    const result = await details({ md5: 'BBBB', version: '1.2.2.9' }, { releasedVersion: '1.2.3.0' });
    expect(result.map((d) => d.code)).toEqual([6]);
    expect(result[0]?.message).toBe(
      `File ${SUBJECT} had a version of 1.2.3.0 in the last release. The version has since been lowered to 1.2.2.9. Patching will fail.`
    );
  });

  it('reports Error 9 when the version disappeared', async () => {
    const result = await details({ md5: 'BBBB', version: '' });
    expect(result.map((d) => d.code)).toEqual([9]);
    expect(result[0]?.message).toBe(
      `File ${SUBJECT} had a version of 1.2.3.4 in the last release. The version information has since been removed. Patching will fail.`
    );
  });

  it('reports Error 7 with the reason for an unparseable library version', async () => {
    const result = await details({ md5: 'BBBB', version: '1.0.0.0' }, { releasedVersion: '1.x' });
    expect(result.map((d) => d.code)).toEqual([7]);
    expect(result[0]?.message).toBe(
      `File ${SUBJECT} has invalid version number (possibly in FileLibrary.xml): Segment index 1 of version 1.x is not a number.`
    );
  });

  describe('date check', () => {
    it('reports Error 2 when the file is more than a day older', async () => {
      const result = await details({ modifiedAt: new Date(2012, 2, 13, 22, 4, 30) });
      expect(result).toEqual([
        {
          kind: 'diagnostic',
          severity: 'error',
          code: 2,
          message: `File ${SUBJECT} has a date/time stamp (3/13/2012 10:04 PM) that is earlier than a previously released version (3/14/2012 10:05 PM). Patching may fail.`,
          subject: SUBJECT,
        },
      ]);
    });

    it('allows exactly 24 hours', async () => {
      expect(await details({ modifiedAt: new Date(2012, 2, 13, 22, 5) })).toEqual([]);
    });

    it('ignores newer files', async () => {
      expect(await details({ modifiedAt: new Date(2013, 0, 1) })).toEqual([]);
    });

    it('is skipped when the library date could not be parsed', async () => {
      const result = await details({ modifiedAt: new Date(2000, 0, 1) }, { releasedDate: 'garbled', releasedAt: null });
      expect(result).toEqual([]);
    });
  });

  describe('zero version', () => {
    it('reports Warning 3', async () => {
      const result = await details({ version: '0.0.0.0' }, { releasedVersion: '' });
      expect(result).toEqual([
        {
          kind: 'diagnostic',
          severity: 'warning',
          code: 3,
          message: `File ${SUBJECT} has a version number of 0.0.0.0.`,
          subject: SUBJECT,
        },
      ]);
    });

    it('honours exemptions', async () => {
      const result = await checkFileDetails(
        entry({ releasedVersion: '' }),
        context(async () => facts({ version: '0.0.0.0' }), ['\\${config}\\CORE.dll'])
      );
      expect(result).toEqual([]);
    });
  });

  it('reports several problems for one file in order', async () => {
    const result = await details({ md5: 'BBBB', version: '1.2.3.4', modifiedAt: new Date(2011, 0, 1) });
    expect(result.map((d) => d.code)).toEqual([1, 2]);
  });
});
