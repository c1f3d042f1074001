export { discoverRepos, discoverReposStructured, SKIP_DIRS, shouldSkipDir } from './discovery/index.js';
export { fuzzyMatch, fuzzyScore, fuzzySort, NO_MATCH } from './match/index.js';
export { repoItem, notFoundItem, emptyItem, renderOutput } from './launcher/index.js';
export { searchRepos, type SearchRequest, type SearchResult } from './cli/search.js';
export { loadConfig, saveConfig, getDefaultConfig, ConfigError, type CodehopConfig } from './config.js';
export { expandPath } from './utils/paths.js';
export type * from './types.js';
