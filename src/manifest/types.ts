/**
 * Types for the WiX manifest index
 *
 * Manifest sources are parsed once into plain records; all queries run
 * against those records, never against the XML.
 */

/**
 * A `<Component>` declaration
 */
export interface ComponentRecord {
  /** Component GUID as written in the source */
  guid: string;
  /** Manifest-local component Id */
  id: string;
  /** Id of the enclosing Directory/DirectoryRef (or the Directory attribute) */
  directoryId: string;
  /** Features that reference this component, across all sources */
  featureIds: ReadonlySet<string>;
  /** Manifest source that declares the component */
  sourcePath: string;
}

/**
 * A `<File>` declaration
 */
export interface ManifestFileRecord {
  id: string;
  /** Short (8.3) name, or the only name */
  name: string;
  /** Long name, when declared separately */
  longName: string;
  /** `Source` attribute: where the build takes the file from */
  source: string;
  componentId: string;
  /** Id of the directory the component installs into */
  directoryId: string;
  sourcePath: string;
}

/**
 * A `<Feature>` or `<FeatureRef>` with its direct `<ComponentRef>` children
 */
export interface FeatureReference {
  featureId: string;
  componentIds: string[];
  sourcePath: string;
}

/**
 * One parsed manifest document
 */
export interface ManifestSource {
  /** Absolute path of the document */
  path: string;
  /** File name, e.g. "Files.wxs" */
  name: string;
  components: Array<Omit<ComponentRecord, 'featureIds'>>;
  files: ManifestFileRecord[];
  featureReferences: FeatureReference[];
}

/**
 * Which manifest files to load, relative to the installer directory
 */
export interface ManifestSourceList {
  /** Must exist; a missing one aborts the run */
  mandatory: string[];
  /** Loaded when present (corrections overlay) */
  optional: string[];
}

/**
 * Default WiX sources of the installer
 */
export const DEFAULT_MANIFEST_SOURCES: ManifestSourceList = {
  mandatory: ['Files.wxs', 'AutoFiles.wxs'],
  optional: ['PatchCorrections.wxs'],
};
