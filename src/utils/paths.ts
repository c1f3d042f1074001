import { isAbsolute, join, relative } from 'node:path';
import { homedir } from 'node:os';

export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Path of `target` relative to `root`, or `null` when it cannot be expressed
 * underneath it (different drive, or the target escapes the root).
 */
export function relativeUnder(root: string, target: string): string | null {
  const rel = relative(root, target);
  if (rel === '' || isAbsolute(rel) || rel === '..' || rel.startsWith('../') || rel.startsWith('..\\')) {
    return null;
  }
  return rel;
}
