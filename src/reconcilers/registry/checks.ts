/**
 * Checks for one RegLibrary entry
 *
 * Registry components only need to stay present; there is nothing on
 * disk to compare.
 */

import type { RegistryLibraryEntry } from '../../library/types.js';
import type { ManifestIndex } from '../../manifest/manifest-index.js';
import type { FragmentEntry } from '../../diagnostics/log.js';
import { synthesizeRegistryFragment, type SynthesizeOptions } from '../../snippets/fragment.js';

export function checkRegistryPresence(
  entry: RegistryLibraryEntry,
  manifest: ManifestIndex,
  options: SynthesizeOptions = {}
): FragmentEntry[] {
  if (!entry.guid || manifest.findComponent(entry.guid)) {
    return [];
  }

  const fragment = synthesizeRegistryFragment(entry, options);
  return [{ kind: 'fragment', lines: fragment.lines, subject: `${entry.root}\\${entry.keyHeader}` }];
}
