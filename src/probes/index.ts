/**
 * File probe exports
 */

export { probeFile, readPeFileVersion, type FileFacts, type FileProbe } from './file-probe.js';
