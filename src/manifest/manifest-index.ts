/**
 * Manifest index
 *
 * Pre-built lookup tables over the ordered manifest sources:
 * guid → component, componentId → features, file name → file records.
 * Where several sources declare the same thing, the earliest source in
 * list order wins, matching how the installer build resolves duplicates.
 */

import type { ComponentRecord, ManifestFileRecord, ManifestSource } from './types.js';
import { makeRelativePath } from '../utils/paths.js';

/**
 * Normalise a GUID for lookups: no braces, upper case
 */
export function normalizeGuid(guid: string): string {
  return guid.trim().replace(/^\{/, '').replace(/\}$/, '').toUpperCase();
}

export interface ManifestIndexOptions {
  /** Root used to make file `Source` paths relative */
  projectRoot?: string;
}

export class ManifestIndex {
  private readonly componentsByGuid = new Map<string, ComponentRecord>();
  private readonly featuresByComponentId = new Map<string, Set<string>>();
  private readonly filesByName = new Map<string, ManifestFileRecord[]>();
  private readonly projectRoot?: string;

  private constructor(
    public readonly sources: readonly ManifestSource[],
    options: ManifestIndexOptions
  ) {
    this.projectRoot = options.projectRoot;

    for (const source of sources) {
      for (const reference of source.featureReferences) {
        for (const componentId of reference.componentIds) {
          let features = this.featuresByComponentId.get(componentId);
          if (!features) {
            features = new Set();
            this.featuresByComponentId.set(componentId, features);
          }
          features.add(reference.featureId);
        }
      }

      for (const file of source.files) {
        const names = new Set([file.longName, file.name].filter((name) => name.length > 0));
        for (const name of names) {
          const bucket = this.filesByName.get(name) ?? [];
          bucket.push(file);
          this.filesByName.set(name, bucket);
        }
      }
    }

    for (const source of sources) {
      for (const component of source.components) {
        const key = normalizeGuid(component.guid);
        // "*" asks the compiler to generate a GUID, so it identifies nothing
        if (key === '' || key === '*' || this.componentsByGuid.has(key)) continue;
        this.componentsByGuid.set(key, {
          ...component,
          featureIds: this.featuresReferencing(component.id),
        });
      }
    }
  }

  /**
   * Build an index over sources given in precedence order
   */
  static build(sources: readonly ManifestSource[], options: ManifestIndexOptions = {}): ManifestIndex {
    return new ManifestIndex(sources, options);
  }

  /**
   * True if any source declares a component with this GUID
   */
  findComponent(guid: string): boolean {
    return this.getComponent(guid) !== undefined;
  }

  /**
   * First component declared with this GUID
   */
  getComponent(guid: string): ComponentRecord | undefined {
    const key = normalizeGuid(guid);
    if (key === '') return undefined;
    return this.componentsByGuid.get(key);
  }

  /**
   * All features whose ComponentRef children include the component id
   */
  featuresReferencing(componentId: string): Set<string> {
    return new Set(this.featuresByComponentId.get(componentId) ?? []);
  }

  /**
   * Find a file with the same name that installs into the same directory
   *
   * Such a file has moved between source locations (e.g. from
   * Output\Release to DistFiles) but still lands in the same place, so it
   * needs no removal on patch, only a replacement component.
   *
   * @param longName - Long (or only) name of the file
   * @param directoryId - Directory the library recorded for the file
   * @returns the match's `Source` path, relative to the project root when possible
   */
  findFileElsewhere(longName: string, directoryId: string): string | undefined {
    if (!longName) return undefined;

    const match = (this.filesByName.get(longName) ?? []).find(
      (file) => file.directoryId === directoryId
    );
    if (!match) return undefined;

    return this.projectRoot ? makeRelativePath(match.source, this.projectRoot) : match.source;
  }

  /** Number of distinct component GUIDs indexed */
  get componentCount(): number {
    return this.componentsByGuid.size;
  }
}
