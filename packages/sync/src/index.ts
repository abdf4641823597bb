/**
 * @dashsync/sync
 * 
 * Synchronization core.
 * 
 * - Folder watcher with size/glob filtering
 * - Per-path debouncer (last write wins)
 * - Watch service wiring changes to the upload router
 * - Bulk upload of everything already on disk
 * - Deletion reconciler for orphaned remote files
 */

export {
  FolderWatcher,
  FileFilter,
  Debouncer,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_IGNORE_PATTERNS,
  type WatcherConfig,
  type ChangeEvent,
  type ChangeKind,
  type RejectedEvent,
  type WatcherErrorEvent,
  type FileFilterConfig,
  type FilterVerdict,
  type RejectReason,
  type DebounceCallback,
} from './watcher/index.js';

export {
  WatchService,
  DEFAULT_DEBOUNCE_MS,
  type WatchServiceConfig,
} from './watchService.js';

export {
  uploadAll,
  type BulkUploadConfig,
  type BulkUploadSummary,
} from './bulkUploader.js';

export {
  DeletionReconciler,
  flattenFileTree,
  findOrphans,
  DEFAULT_EXTENSIONS,
  type ReconcileOptions,
  type ReconcileReport,
  type ReconcileStatus,
  type ReconcilerConfig,
} from './reconcile/reconciler.js';
