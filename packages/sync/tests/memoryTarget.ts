import type { FileTreeNode, Target, UploadFields } from '@dashsync/core';
import type { Credential, TargetClient, TargetResponse } from '@dashsync/upload';

/**
 * Target that keeps stored paths in memory and serves them as a file tree
 */
export class MemoryTarget implements TargetClient {
  readonly target: Target;
  readonly files: Map<string, string> = new Map();
  readonly uploads: UploadFields[] = [];
  readonly deletes: string[] = [];
  healthChecks = 0;

  constructor(target: Target, paths: string[] = []) {
    this.target = target;
    for (const path of paths) {
      this.files.set(path, '');
    }
  }

  async health(): Promise<TargetResponse> {
    this.healthChecks++;
    return { statusCode: 200, text: '{"status":"ok"}' };
  }

  async upload(content: Buffer, _filename: string, fields: UploadFields, _auth: Credential | null): Promise<TargetResponse> {
    this.uploads.push(fields);
    this.files.set(fields.path, content.toString('utf8'));
    return { statusCode: 200, text: '' };
  }

  async deleteFile(relativePath: string, _auth: Credential | null): Promise<TargetResponse> {
    this.deletes.push(relativePath);
    return { statusCode: this.files.delete(relativePath) ? 200 : 404, text: '' };
  }

  async listFiles(_auth: Credential | null): Promise<TargetResponse> {
    return { statusCode: 200, text: JSON.stringify(this.tree()) };
  }

  private tree(): FileTreeNode {
    const root: FileTreeNode = { name: 'data', type: 'directory', path: '', children: [] };

    for (const path of [...this.files.keys()].sort()) {
      const parts = path.split('/');
      let node = root;
      parts.forEach((name, index) => {
        const childPath = parts.slice(0, index + 1).join('/');
        const isFile = index === parts.length - 1;
        node.children ??= [];
        let child = node.children.find(c => c.name === name);
        if (!child) {
          child = isFile
            ? { name, type: 'file', path: childPath, size: 0 }
            : { name, type: 'directory', path: childPath, children: [] };
          node.children.push(child);
        }
        node = child;
      });
    }

    return root;
  }
}
