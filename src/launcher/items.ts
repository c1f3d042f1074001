import type { LauncherItem, LauncherOutput, RepositoryEntry } from '../types.js';

const SYSTEM_ICONS = '/System/Library/CoreServices/CoreTypes.bundle/Contents/Resources';
export const ALERT_ICON = `${SYSTEM_ICONS}/AlertStopIcon.icns`;
export const FOLDER_ICON = `${SYSTEM_ICONS}/GenericFolderIcon.icns`;

export interface RepoItemOptions {
  /** Mark the item as a file so the launcher offers its file actions. */
  fileType?: boolean;
}

/**
 * One result row. Actioning it passes the absolute path on; copying it yields
 * the path as the user typed the root (e.g. `~/code/acme/widgets`).
 */
export function repoItem(entry: RepositoryEntry, rootLabel: string, options: RepoItemOptions = {}): LauncherItem {
  const item: LauncherItem = {
    uid: entry.path,
    title: entry.display,
    arg: entry.path,
    icon: { type: 'fileicon', path: entry.path },
    autocomplete: entry.display,
    match: entry.display,
    quicklookurl: entry.path,
    text: { copy: `${rootLabel}/${entry.display}` },
  };
  if (options.fileType) item.type = 'file';
  return item;
}

export function notFoundItem(rootLabel: string, settingName: string): LauncherItem {
  return {
    title: `No directory found at ${rootLabel}`,
    subtitle: `Check your ${settingName} setting`,
    valid: false,
    icon: { path: ALERT_ICON },
  };
}

export function emptyItem(rootLabel: string): LauncherItem {
  return {
    title: 'No git repositories found',
    subtitle: `in ${rootLabel}`,
    valid: false,
    icon: { path: FOLDER_ICON },
  };
}

export function renderOutput(output: LauncherOutput): string {
  return JSON.stringify(output);
}
