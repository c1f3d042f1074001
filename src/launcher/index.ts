export { repoItem, notFoundItem, emptyItem, renderOutput, ALERT_ICON, FOLDER_ICON, type RepoItemOptions } from './items.js';
