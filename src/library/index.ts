/**
 * Library snapshot exports
 */

export type {
  FileLibraryEntry,
  RegistryLibraryEntry,
  LibraryIssue,
  LibraryTable,
  LibrarySnapshot,
} from './types.js';
export { FILE_LIBRARY_NAME, REGISTRY_LIBRARY_NAME } from './types.js';

export {
  parseFeatureList,
  parseFileLibrary,
  parseRegistryLibrary,
  loadLibrarySnapshot,
  describeIssues,
} from './loader.js';

export { parseLibraryDate, truncateToMinute, formatLibraryDate } from './dates.js';
