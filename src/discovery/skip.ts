// Build output, dependency caches and tool state that never hold a project
// worth jumping to, and are often huge or unreadable.
export const SKIP_DIRS: ReadonlySet<string> = new Set([
  'node_modules',
  'target',
  'dist',
  'build',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  'venv',
  '.venv',
  'vendor',
  'Pods',
  '.cargo',
  '.rustup',
  '.next',
  '.turbo',
  '.cache',
]);

export function shouldSkipDir(name: string, extra: ReadonlySet<string> = new Set()): boolean {
  if (name.startsWith('.')) return true;
  return SKIP_DIRS.has(name) || extra.has(name);
}
