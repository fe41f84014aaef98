/**
 * File probes for the detail check
 *
 * Reads what the patch engine looks at on a built file: content hash,
 * embedded version resource and last-write time.
 */

import { readFile, stat } from 'node:fs/promises';
import { md5Hex } from '../snippets/identifiers.js';

/**
 * Current state of a built file
 */
export interface FileFacts {
  /** Upper-case hex MD5 of the content */
  md5: string;
  /** "major.minor.build.private", or "" when the file carries no version resource */
  version: string;
  modifiedAt: Date;
}

/**
 * Reads facts for a path; resolves to null when the file does not exist
 */
export type FileProbe = (path: string) => Promise<FileFacts | null>;

/** `VS_FIXEDFILEINFO.dwSignature`, little-endian */
const FIXED_FILE_INFO_SIGNATURE = 0xfeef04bd;
/** Signature, struct version, FileVersionMS, FileVersionLS */
const FIXED_FILE_INFO_PREFIX = 16;

/**
 * Extract the file version from a PE image's VS_FIXEDFILEINFO block
 *
 * @returns "a.b.c.d", or "" when the buffer is not a PE image or has no
 *   version resource
 */
export function readPeFileVersion(buffer: Buffer): string {
  if (buffer.length < 2 || buffer[0] !== 0x4d || buffer[1] !== 0x5a) {
    return '';
  }

  const signature = Buffer.alloc(4);
  signature.writeUInt32LE(FIXED_FILE_INFO_SIGNATURE, 0);

  let offset = buffer.indexOf(signature);
  while (offset !== -1) {
    if (offset + FIXED_FILE_INFO_PREFIX <= buffer.length) {
      const ms = buffer.readUInt32LE(offset + 8);
      const ls = buffer.readUInt32LE(offset + 12);
      return [ms >>> 16, ms & 0xffff, ls >>> 16, ls & 0xffff].join('.');
    }
    offset = buffer.indexOf(signature, offset + 1);
  }
  return '';
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Default probe backed by the file system
 */
export const probeFile: FileProbe = async (path) => {
  const info = await stat(path).catch((err: unknown) => {
    if (isMissingFileError(err)) return null;
    throw err;
  });
  if (!info?.isFile()) return null;

  const content = await readFile(path);
  return {
    md5: md5Hex(content),
    version: readPeFileVersion(content),
    modifiedAt: info.mtime,
  };
};
