import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { ValidationError } from '@dashsync/core';
import { FileStore } from '../src/storage/fileStore.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

const permissionDenied = (path: string): Error =>
  Object.assign(new Error(`EACCES: permission denied, scandir '${path}'`), { code: 'EACCES' });

describe('FileStore', () => {
  let root: string;
  let store: FileStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'dashsync-store-'));
    store = new FileStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('rejects keys that escape the root', () => {
    expect(() => store.normalizeKey('../outside.json')).toThrow(ValidationError);
    expect(store.normalizeKey('/prompts//bar/p.json')).toBe('prompts/bar/p.json');
  });

  it('lists an unreadable directory as empty and keeps the rest', async () => {
    await writeFile(join(root, 'a.json'), '{}');
    await mkdir(join(root, 'locked'));
    await writeFile(join(root, 'locked', 'b.json'), '{}');
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    vi.mocked(readdir)
      .mockImplementationOnce(actual.readdir)
      .mockRejectedValueOnce(permissionDenied(join(root, 'locked')));

    const tree = await store.buildTree();

    expect(tree).toMatchObject({ name: basename(root), type: 'directory', path: '' });
    expect(tree.children).toHaveLength(2);
    expect(tree.children?.[0]).toMatchObject({ name: 'a.json', type: 'file', path: 'a.json', size: 2, extension: '.json' });
    expect(tree.children?.[1]).toEqual({ name: 'locked', type: 'directory', path: 'locked', children: [] });
  });

  it('still fails on other read errors', async () => {
    vi.mocked(readdir).mockRejectedValueOnce(
      Object.assign(new Error('EIO: i/o error'), { code: 'EIO' })
    );

    await expect(store.buildTree()).rejects.toThrow('EIO: i/o error');
  });
});
