export { discoverRepos, discoverReposStructured, compareDisplay } from './scanner.js';
export { SKIP_DIRS, shouldSkipDir } from './skip.js';
