/**
 * Fetching: staging of remote and local plugin trees.
 */

export { Fetcher, discardDir } from './fetcher.js'
export type { StagedTree, FetcherOptions } from './fetcher.js'

export { SimpleGitClient, cloneArgs, isCommitHash, isGitTimeout } from './git-client.js'
export type { GitClient, CloneOptions } from './git-client.js'

export { verifyTree, fingerprintTree, buildFileManifest, isInside, DEFAULT_TREE_LIMITS } from './tree.js'
export type { TreeLimits, TreeStats, FileManifestEntry } from './tree.js'
