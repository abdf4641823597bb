/**
 * @dashsync/upload
 * 
 * Upload layer.
 * 
 * Pushes files to one or more dashboard storage services over HTTP:
 * - Multipart uploads with path, collection and timestamp
 * - Idempotent deletes (404 counts as success)
 * - File-tree listing for reconciliation
 * - Basic-auth gate for protected datasets
 */

// HTTP target client
export {
  HttpTarget,
  encodeStoragePath,
  basicAuthHeader,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_HEALTH_TIMEOUT_MS,
  type HttpTargetOptions,
  type TargetClient,
  type TargetResponse,
} from './targets/httpTarget.js';

// Upload router
export {
  UploadRouter,
  DEFAULT_DELETE_DELAY_MS,
  type UploadRouterConfig,
  type UploadRecord,
  type DeleteRecord,
  type TargetOutcome,
} from './router.js';

// Credentials
export {
  AuthGate,
  PromptCredentialSource,
  type AuthPolicy,
  type Credential,
  type CredentialSource,
  type PasswordPrompt,
  type PromptCredentialOptions,
} from './credentials.js';

// Path handling
export { PathMapper } from './pathMapper.js';
export { detectCollection, UNKNOWN_COLLECTION } from './collection.js';
