/**
 * @dashsync/core
 * 
 * Core package containing:
 * - Error handling
 * - Shared types (targets, wire payloads, file tree)
 */

// Errors
export {
  SyncError,
  ValidationError,
  NotFoundError,
  ConfigError,
  TargetRequestError,
  ListingFormatError,
} from './errors/index.js';

// Types
export type {
  Target,
  TargetName,
  TargetChoice,
  UploadFields,
  UploadResponse,
  HealthResponse,
} from './types/target.js';

export {
  fileTreeNodeSchema,
  type FileTreeNode,
  type FileTreeNodeType,
} from './types/fileTree.js';
