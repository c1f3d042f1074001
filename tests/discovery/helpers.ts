import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

/** Create `dir` as a repository, with either a .git directory or a worktree pointer file. */
export async function makeRepo(dir: string, marker: 'dir' | 'file' = 'dir'): Promise<void> {
  await mkdir(dir, { recursive: true });
  if (marker === 'dir') {
    await mkdir(join(dir, '.git'), { recursive: true });
    await writeFile(join(dir, '.git', 'HEAD'), 'ref: refs/heads/main\n');
  } else {
    await writeFile(join(dir, '.git'), 'gitdir: /tmp/elsewhere/.git/worktrees/x\n');
  }
}
