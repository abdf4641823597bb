/**
 * Watcher Module
 * 
 * File system watching components.
 */

export {
  FolderWatcher,
  type WatcherConfig,
  type ChangeEvent,
  type ChangeKind,
  type RejectedEvent,
  type WatcherErrorEvent,
} from './folderWatcher.js';

export {
  FileFilter,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_IGNORE_PATTERNS,
  type FileFilterConfig,
  type FilterVerdict,
  type RejectReason,
} from './fileFilter.js';

export { Debouncer, type DebounceCallback } from './debouncer.js';
