/**
 * Library snapshot types
 *
 * The file and registry libraries record every file and registry
 * component shipped in previous releases. They are the baseline a patch
 * is built against, and are read-only for the whole run.
 */

/**
 * A file known from a prior release (`FileLibrary/File`)
 */
export interface FileLibraryEntry {
  /** Build-relative path, may contain `${config}` */
  path: string;
  /** `Date` attribute as written */
  releasedDate: string;
  /** Parsed `Date`; null when it could not be parsed */
  releasedAt: Date | null;
  /** May be empty for unversioned files */
  releasedVersion: string;
  releasedMd5: string;
  /** Features the file belonged to; order is irrelevant */
  featureList: readonly string[];
  componentGuid: string;
  componentId: string;
  directoryId: string;
  longName: string;
  shortName: string;
}

/**
 * A registry component known from a prior release (`RegLibrary/Component`)
 */
export interface RegistryLibraryEntry {
  guid: string;
  /** Registry root, e.g. HKLM */
  root: string;
  keyHeader: string;
  directoryId: string;
  /** Component Id */
  id: string;
  featureList: readonly string[];
}

/**
 * Problem found while validating a library entry
 */
export interface LibraryIssue {
  /** 1-based position of the entry in the document */
  position: number;
  /** Path or key of the entry, when it has one */
  subject: string;
  reason: string;
}

/**
 * Entries of one library document
 */
export interface LibraryTable<T> {
  /** Absolute path of the document */
  path: string;
  entries: readonly T[];
  issues: readonly LibraryIssue[];
}

/**
 * Both libraries; a missing document is normal before the first release
 */
export interface LibrarySnapshot {
  files?: LibraryTable<FileLibraryEntry>;
  registry?: LibraryTable<RegistryLibraryEntry>;
}

export const FILE_LIBRARY_NAME = 'FileLibrary.xml';
export const REGISTRY_LIBRARY_NAME = 'RegLibrary.xml';
