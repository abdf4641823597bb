/**
 * Target Types
 */

export type TargetName = 'local' | 'server';

export type TargetChoice = TargetName | 'both';

export interface Target {
  name: TargetName;
  url: string;
}

/**
 * Upload form fields sent alongside the file bytes
 */
export interface UploadFields {
  path: string;
  collection: string;
  timestamp: string;
}

/**
 * Storage service reply to a successful upload
 */
export interface UploadResponse extends UploadFields {
  status: 'success';
  size: number;
}

export interface HealthResponse {
  status: string;
  timestamp: string;
}
