export { fuzzyMatch, fuzzyScore, fuzzySort, NO_MATCH } from './fuzzy.js';
