/**
 * Path helpers
 *
 * Library and manifest paths are written Windows-style
 * (`Output\${config}\Foo.dll`); everything here accepts either separator.
 */

import { join, relative, isAbsolute, sep } from 'node:path';

/** Placeholder for the active build flavor in library paths and patterns */
export const BUILD_TYPE_PLACEHOLDER = '${config}';

/**
 * Replace every `${config}` with the build type
 */
export function substituteBuildType(value: string, buildType: string): string {
  return value.split(BUILD_TYPE_PLACEHOLDER).join(buildType);
}

/**
 * Normalise a path for pattern matching: forward slashes, lower case
 */
export function normalizeForMatch(path: string): string {
  return path.replace(/\\/g, '/').toLowerCase();
}

/**
 * Case-insensitive substring match against a list of path patterns
 *
 * `${config}` is substituted on both sides.
 *
 * @example
 * matchesAnyPattern('C:/fw/Output/Release/Foo.dll', ['\\${config}\\foo'], 'Release') // true
 */
export function matchesAnyPattern(
  path: string,
  patterns: readonly string[],
  buildType: string
): boolean {
  const candidate = normalizeForMatch(substituteBuildType(path, buildType));
  return patterns.some((pattern) =>
    candidate.includes(normalizeForMatch(substituteBuildType(pattern, buildType)))
  );
}

/**
 * Resolve a library path against the project root
 */
export function resolveLibraryPath(projectRoot: string, libraryPath: string, buildType: string): string {
  const parts = substituteBuildType(libraryPath, buildType)
    .split(/[\\/]+/)
    .filter((part) => part.length > 0);
  return join(projectRoot, ...parts);
}

/**
 * Strip the project root from a manifest `Source` path
 *
 * Paths outside the root are returned unchanged.
 */
export function makeRelativePath(path: string, projectRoot: string): string {
  const native = path.replace(/[\\/]+/g, sep);
  if (!isAbsolute(native)) {
    return path;
  }
  const rel = relative(projectRoot, native);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return path;
  }
  return rel.split(sep).join('\\');
}
