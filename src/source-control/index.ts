/**
 * Source control exports
 */

export {
  execGit,
  listUntrackedFiles,
  getCurrentBranch,
  type GitRunner,
  type UntrackedQuery,
} from './git.js';
