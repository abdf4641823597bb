/**
 * File Tree Types
 *
 * Shape of the storage service's listing response. Shared by the service
 * that builds it and the reconciler that consumes it.
 */

import { z } from 'zod';

export type FileTreeNodeType = 'file' | 'directory';

export interface FileTreeNode {
  name: string;
  type: FileTreeNodeType;
  path: string;
  children?: FileTreeNode[];
  size?: number;
  modified?: string;
  extension?: string;
}

export const fileTreeNodeSchema: z.ZodType<FileTreeNode> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.enum(['file', 'directory']),
    path: z.string(),
    children: z.array(fileTreeNodeSchema).optional(),
    size: z.number().optional(),
    modified: z.string().optional(),
    extension: z.string().optional(),
  })
);
