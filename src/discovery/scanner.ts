import { existsSync, readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import { shouldSkipDir } from './skip.js';
import { relativeUnder } from '../utils/paths.js';
import type { DiscoveryOptions, RepositoryEntry } from '../types.js';

function statOrNull(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

function listDirectory(dir: string, onError: DiscoveryOptions['onError']): Dirent[] | null {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    onError?.(dir, err);
    return null;
  }
}

// Follows symlinks; only the structured scan uses it.
function isDirectory(entry: Dirent, path: string): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  return statOrNull(path)?.isDirectory() ?? false;
}

function hasGitMarker(dir: string): boolean {
  const marker = statOrNull(join(dir, '.git'));
  if (!marker) return false;
  // A file marker is a worktree or submodule pointer.
  return marker.isDirectory() || marker.isFile();
}

/** Code point order, which is UTF-8 byte order. */
export function compareDisplay(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca - cb;
    // Equal code points span the same number of units in both strings.
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

function sortByDisplay(entries: RepositoryEntry[]): RepositoryEntry[] {
  return entries.sort((a, b) => compareDisplay(a.display, b.display));
}

/**
 * Find git repositories at any depth below `root`.
 *
 * The walk uses an explicit stack rather than recursion. Skipped directories
 * are pruned before they are read, repositories are leaves, and `root` itself
 * is never reported even when it is a repository. Symlinks are not followed.
 */
export function discoverRepos(root: string, options: DiscoveryOptions = {}): RepositoryEntry[] {
  const rootPath = resolve(root);
  const extraSkip = new Set(options.extraSkipDirs ?? []);
  const repos: RepositoryEntry[] = [];
  const seen = new Set<string>();
  const stack: string[] = [rootPath];

  let dir = stack.pop();
  while (dir !== undefined) {
    const entries = listDirectory(dir, options.onError);

    for (const entry of entries ?? []) {
      if (shouldSkipDir(entry.name, extraSkip)) continue;

      if (!entry.isDirectory()) continue;
      const path = join(dir, entry.name);

      if (hasGitMarker(path)) {
        if (!seen.has(path)) {
          seen.add(path);
          repos.push({ display: relativeUnder(rootPath, path) ?? path, path });
        }
        continue;
      }

      stack.push(path);
    }

    dir = stack.pop();
  }

  return sortByDisplay(repos);
}

/**
 * Find git repositories laid out as `root/<owner>/<repo>`.
 *
 * Exactly two levels are read. Hidden owners and repos are ignored, but the
 * build/cache skip list does not apply here.
 */
export function discoverReposStructured(root: string, options: DiscoveryOptions = {}): RepositoryEntry[] {
  const rootPath = resolve(root);
  const repos: RepositoryEntry[] = [];

  for (const owner of listDirectory(rootPath, options.onError) ?? []) {
    if (owner.name.startsWith('.')) continue;

    const ownerPath = join(rootPath, owner.name);
    if (!isDirectory(owner, ownerPath)) continue;

    for (const repo of listDirectory(ownerPath, options.onError) ?? []) {
      if (repo.name.startsWith('.')) continue;

      const repoPath = join(ownerPath, repo.name);
      if (!isDirectory(repo, repoPath)) continue;

      if (existsSync(join(repoPath, '.git'))) {
        repos.push({ display: `${owner.name}/${repo.name}`, path: repoPath });
      }
    }
  }

  return sortByDisplay(repos);
}
