/**
 * Command exports
 */

export { checkCommand, type CheckOptions, type CheckResult } from './check.js';
export { codesCommand } from './codes.js';
export { makeIdCommand, type MakeIdOptions } from './make-id.js';
