import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { loadConfig } from '../config.js';
import { discoverRepos, discoverReposStructured } from '../discovery/index.js';
import { fuzzyMatch, fuzzySort } from '../match/index.js';
import { emptyItem, notFoundItem, renderOutput, repoItem } from '../launcher/index.js';
import { expandPath } from '../utils/paths.js';
import type { DiscoveryMode, DiscoveryOptions, LauncherOutput, RepositoryEntry } from '../types.js';

export interface SearchRequest {
  mode: DiscoveryMode;
  query: string;
  /** Root as the user wrote it; `~` is expanded here. */
  root: string;
  discovery?: DiscoveryOptions;
}

export interface SearchResult {
  status: 'ok' | 'missing-root' | 'empty';
  /** Matching repositories, best first. */
  entries: RepositoryEntry[];
  output: LauncherOutput;
}

const ROOT_SETTING: Record<DiscoveryMode, string> = {
  code: 'code.root',
  repos: 'repos.root',
};

export function searchRepos(request: SearchRequest): SearchResult {
  const { mode, query, root } = request;
  const rootPath = expandPath(root);

  if (!existsSync(rootPath)) {
    return {
      status: 'missing-root',
      entries: [],
      output: { items: [notFoundItem(root, ROOT_SETTING[mode])] },
    };
  }

  const repos = mode === 'code'
    ? discoverRepos(rootPath, request.discovery)
    : discoverReposStructured(rootPath, request.discovery);

  if (repos.length === 0) {
    return { status: 'empty', entries: [], output: { items: [emptyItem(root)] } };
  }

  const entries = repos.filter((entry) => fuzzyMatch(query, entry.display));
  fuzzySort(entries, query, (entry) => entry.display);

  return {
    status: 'ok',
    entries,
    output: {
      items: entries.map((entry) => repoItem(entry, root, { fileType: mode === 'code' })),
    },
  };
}

interface SearchCommandOptions {
  root?: string;
  plain?: boolean;
  verbose?: boolean;
}

function printPlain(result: SearchResult, root: string): void {
  switch (result.status) {
    case 'missing-root':
      console.error(chalk.red(`No directory found at ${root}`));
      process.exitCode = 1;
      return;
    case 'empty':
      console.error(chalk.dim(`No git repositories found in ${root}`));
      return;
    case 'ok':
      for (const entry of result.entries) {
        console.log(`${entry.display}\t${entry.path}`);
      }
  }
}

function createSearchCommand(mode: DiscoveryMode, description: string): Command {
  return new Command(mode)
    .description(description)
    .argument('[query]', 'Search query', '')
    .option('-r, --root <dir>', `Root directory to scan (default: ${ROOT_SETTING[mode]} from config)`)
    .option('--plain', 'Print "display<TAB>path" lines instead of launcher JSON')
    .option('-v, --verbose', 'Report unreadable directories on stderr')
    .action(async (query: string, opts: SearchCommandOptions) => {
      try {
        const config = await loadConfig();
        const root = opts.root ?? config[mode].root;

        const onError = opts.verbose
          ? (dir: string, err: unknown) => {
              console.error(chalk.dim(`  skipped ${dir}: ${err instanceof Error ? err.message : String(err)}`));
            }
          : undefined;

        const result = searchRepos({
          mode,
          query,
          root,
          discovery: { extraSkipDirs: config.discovery.extraSkipDirs, onError },
        });

        if (opts.plain) {
          printPlain(result, root);
          return;
        }

        console.log(renderOutput(result.output));
      } catch (err) {
        console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
      }
    });
}

export const codeCommand = createSearchCommand('code', 'Search git repositories at any depth under the code root');

export const reposCommand = createSearchCommand('repos', 'Search git repositories laid out as owner/repo under the repos root');
