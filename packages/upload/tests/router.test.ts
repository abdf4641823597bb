import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ListingFormatError, TargetRequestError } from '@dashsync/core';
import { AuthGate, PromptCredentialSource } from '../src/credentials.js';
import { PathMapper } from '../src/pathMapper.js';
import { UploadRouter } from '../src/router.js';
import { FakeTarget } from './fakeTarget.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

describe('UploadRouter', () => {
  let root: string;
  let local: FakeTarget;
  let server: FakeTarget;
  let router: UploadRouter;

  const writeProjectFile = async (relativePath: string, content: string): Promise<string> => {
    const file = join(root, ...relativePath.split('/'));
    await mkdir(join(file, '..'), { recursive: true });
    await writeFile(file, content);
    return file;
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'dashsync-router-'));
    local = new FakeTarget({ name: 'local', url: 'http://localhost:3000' });
    server = new FakeTarget({ name: 'server', url: 'http://localhost:8000' });
    router = new UploadRouter({
      targets: [],
      clients: [local, server],
      pathMapper: new PathMapper(root),
      deleteDelayMs: 0,
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('upload', () => {
    it('sends content and fields to every target', async () => {
      const file = await writeProjectFile('outputs/summaries/foo/items/x.json', '{"id":1}');

      const record = await router.upload(file);

      expect(record.success).toBe(true);
      expect(record.skipped).toBe(false);
      expect(record.relativePath).toBe('outputs/summaries/foo/items/x.json');
      expect(record.collection).toBe('foo');
      expect(record.outcomes).toEqual([
        { target: 'local', ok: true, statusCode: 200 },
        { target: 'server', ok: true, statusCode: 200 },
      ]);
      for (const target of [local, server]) {
        expect(target.uploads).toHaveLength(1);
        expect(target.uploads[0]).toMatchObject({
          filename: 'x.json',
          content: '{"id":1}',
          fields: { path: 'outputs/summaries/foo/items/x.json', collection: 'foo', timestamp: record.timestamp },
          auth: null,
        });
      }
    });

    it('fails overall when any target does not return 200', async () => {
      const file = await writeProjectFile('prompts/bar/prompt.json', '{}');
      server.uploadStatus = 500;

      const record = await router.upload(file);

      expect(record.success).toBe(false);
      expect(record.outcomes.map(o => o.ok)).toEqual([true, false]);
    });

    it('records transport errors as failed targets', async () => {
      const file = await writeProjectFile('prompts/bar/prompt.json', '{}');
      local.failWith = new TargetRequestError('http://localhost:3000', 'upload', new Error('ECONNREFUSED'));

      const record = await router.upload(file);

      expect(record.success).toBe(false);
      expect(record.outcomes[0]).toEqual({
        target: 'local',
        ok: false,
        error: 'upload request to http://localhost:3000 failed: ECONNREFUSED',
      });
      expect(record.outcomes[1]).toEqual({ target: 'server', ok: true, statusCode: 200 });
    });

    it('skips a file that disappeared', async () => {
      const record = await router.upload(join(root, 'outputs', 'gone.json'));

      expect(record.skipped).toBe(true);
      expect(record.success).toBe(true);
      expect(local.uploads).toHaveLength(0);
      expect(server.uploads).toHaveLength(0);
    });

    it('records a file it cannot read as failed on every target', async () => {
      const file = await writeProjectFile('prompts/bar/locked.json', '{}');
      vi.mocked(readFile).mockRejectedValueOnce(
        Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' })
      );

      const record = await router.upload(file);

      expect(record.success).toBe(false);
      expect(record.skipped).toBe(false);
      expect(record.outcomes).toEqual([
        { target: 'local', ok: false, error: 'EACCES: permission denied' },
        { target: 'server', ok: false, error: 'EACCES: permission denied' },
      ]);
      expect(local.uploads).toHaveLength(0);
      expect(server.uploads).toHaveLength(0);
    });

    it('attaches credentials for protected paths on proxied targets', async () => {
      const gated = new UploadRouter({
        targets: [],
        clients: [local, server],
        pathMapper: new PathMapper(root),
        auth: new AuthGate(
          { proxyHosts: ['localhost:3000'], protectedDatasets: ['privateset'] },
          new PromptCredentialSource({ username: 'researcher', password: 'test-secret' })
        ),
      });
      const file = await writeProjectFile('outputs/chunks/privateset/a.json', '{}');

      await gated.upload(file);

      expect(local.uploads[0]?.auth).toEqual({ username: 'researcher', password: 'test-secret' });
      expect(server.uploads[0]?.auth).toBeNull();
    });
  });

  describe('delete', () => {
    it('treats 404 as success', async () => {
      server.deleteStatus = 404;

      const record = await router.delete(join(root, 'outputs', 'chunks', 'set', 'a.json'));

      expect(record.success).toBe(true);
      expect(local.deletes).toEqual([{ path: 'outputs/chunks/set/a.json', auth: null }]);
      expect(record.outcomes).toEqual([
        { target: 'local', ok: true, statusCode: 200 },
        { target: 'server', ok: true, statusCode: 404 },
      ]);
    });

    it('waits the settle delay before deleting', async () => {
      vi.useFakeTimers();
      try {
        const delayed = new UploadRouter({
          targets: [],
          clients: [local],
          pathMapper: new PathMapper(root),
          deleteDelayMs: 1000,
        });

        const pending = delayed.delete(join(root, 'prompts', 'bar', 'p.json'));
        await vi.advanceTimersByTimeAsync(999);
        expect(local.deletes).toHaveLength(0);

        await vi.advanceTimersByTimeAsync(1);
        await expect(pending).resolves.toMatchObject({ success: true, relativePath: 'prompts/bar/p.json' });
        expect(local.deletes).toEqual([{ path: 'prompts/bar/p.json', auth: null }]);
      } finally {
        vi.useRealTimers();
      }
    });

    it('fails on other status codes', async () => {
      local.deleteStatus = 500;

      const record = await router.delete(join(root, 'a.json'));

      expect(record.success).toBe(false);
      expect(record.outcomes[0]).toEqual({ target: 'local', ok: false, statusCode: 500 });
    });
  });

  describe('listTarget', () => {
    const tree = {
      name: 'data',
      type: 'directory',
      path: '',
      children: [{ name: 'a.json', type: 'file', path: 'a.json', size: 2 }],
    };

    it('parses a valid tree', async () => {
      local.listResponses = [{ statusCode: 200, text: JSON.stringify(tree) }];

      await expect(router.listTarget(local)).resolves.toEqual(tree);
    });

    it('retries once with credentials after a 401', async () => {
      const gated = new UploadRouter({
        targets: [],
        clients: [local],
        pathMapper: new PathMapper(root),
        auth: new AuthGate(
          { proxyHosts: ['localhost:3000'], protectedDatasets: [] },
          new PromptCredentialSource({ username: 'researcher', password: 'test-secret' })
        ),
      });
      local.listResponses = [
        { statusCode: 401, text: 'Authentication required' },
        { statusCode: 200, text: JSON.stringify(tree) },
      ];

      await expect(gated.listTarget(local)).resolves.toEqual(tree);
      expect(local.listAuth).toEqual([null, { username: 'researcher', password: 'test-secret' }]);
    });

    it('rejects bodies that are not a file tree', async () => {
      local.listResponses = [{ statusCode: 200, text: '{"files":[]}' }];
      await expect(router.listTarget(local)).rejects.toBeInstanceOf(ListingFormatError);

      local.listResponses = [{ statusCode: 200, text: '<html>' }];
      await expect(router.listTarget(local)).rejects.toBeInstanceOf(ListingFormatError);
    });

    it('rejects non-200 listings', async () => {
      local.listResponses = [{ statusCode: 503, text: '' }];
      await expect(router.listTarget(local)).rejects.toThrow('status 503');
    });
  });

  describe('healthCheck', () => {
    it('reports each target without throwing', async () => {
      server.failWith = new Error('ECONNREFUSED');

      await expect(router.healthCheck()).resolves.toEqual({ local: true, server: false });
    });
  });
});
