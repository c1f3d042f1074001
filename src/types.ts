export interface RepositoryEntry {
  readonly display: string;
  readonly path: string;
}

export type DiscoveryMode = 'code' | 'repos';

export interface DiscoveryOptions {
  /** Basenames pruned in addition to the built-in skip list (unbounded scan only). */
  extraSkipDirs?: readonly string[];
  /** Called for every directory that could not be listed; the scan continues. */
  onError?: (dir: string, error: unknown) => void;
}

export interface LauncherIcon {
  type?: 'fileicon';
  path: string;
}

export interface LauncherText {
  copy?: string;
}

export interface LauncherItem {
  uid?: string;
  title: string;
  subtitle?: string;
  arg?: string;
  icon?: LauncherIcon;
  valid?: boolean;
  autocomplete?: string;
  match?: string;
  type?: 'file' | 'default';
  quicklookurl?: string;
  text?: LauncherText;
}

export interface LauncherOutput {
  items: LauncherItem[];
  rerun?: number;
}
