import { parse, stringify } from 'smol-toml';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

export interface CodehopConfig {
  code: {
    root: string;
  };
  repos: {
    root: string;
  };
  discovery: {
    extraSkipDirs: string[];
  };
}

// Every key is optional in the file; missing ones come from the defaults.
const configFileSchema = z
  .object({
    code: z.object({ root: z.string().min(1) }).partial(),
    repos: z.object({ root: z.string().min(1) }).partial(),
    discovery: z.object({ extraSkipDirs: z.array(z.string().min(1)) }).partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

export class ConfigError extends Error {
  constructor(
    readonly configPath: string,
    message: string,
  ) {
    super(`${configPath}: ${message}`);
    this.name = 'ConfigError';
  }
}

export function getConfigDir(): string {
  return join(homedir(), '.codehop');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.toml');
}

export function getDefaultConfig(): CodehopConfig {
  return {
    code: {
      root: '~/code',
    },
    repos: {
      root: '~/repos',
    },
    discovery: {
      extraSkipDirs: [],
    },
  };
}

function mergeConfig(defaults: CodehopConfig, overrides: ConfigFile): CodehopConfig {
  return {
    code: { ...defaults.code, ...overrides.code },
    repos: { ...defaults.repos, ...overrides.repos },
    discovery: { ...defaults.discovery, ...overrides.discovery },
  };
}

export async function loadConfig(configPath: string = getConfigPath()): Promise<CodehopConfig> {
  const defaults = getDefaultConfig();

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch {
    return defaults;
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, `invalid TOML (${err instanceof Error ? err.message : String(err)})`);
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(configPath, `${where}: ${issue?.message ?? 'invalid value'}`);
  }

  return mergeConfig(defaults, result.data);
}

export function formatConfig(config: CodehopConfig): string {
  return stringify({
    code: config.code,
    repos: config.repos,
    discovery: config.discovery,
  });
}

export async function saveConfig(config: CodehopConfig, configPath: string = getConfigPath()): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, formatConfig(config), 'utf-8');
}
