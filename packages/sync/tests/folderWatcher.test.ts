import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileFilter, type FilterVerdict } from '../src/watcher/fileFilter.js';
import { FolderWatcher, type ChangeEvent, type RejectedEvent, type WatcherErrorEvent } from '../src/watcher/folderWatcher.js';

class FailingFilter extends FileFilter {
  override async check(): Promise<FilterVerdict> {
    throw new Error('filter failed');
  }
}

describe('FolderWatcher', () => {
  let dir: string;
  let watcher: FolderWatcher;
  let changes: Array<Pick<ChangeEvent, 'kind' | 'path' | 'size'>>;
  let rejected: RejectedEvent[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dashsync-watch-'));
    watcher = new FolderWatcher({ paths: [dir] });
    changes = [];
    rejected = [];
    watcher.on('change', (event: ChangeEvent) => {
      changes.push({ kind: event.kind, path: event.path, size: event.size });
    });
    watcher.on('rejected', (event: RejectedEvent) => rejected.push(event));
    watcher.on('error', () => undefined);
  });

  afterEach(async () => {
    watcher.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('reports created, then modified, then deleted', async () => {
    const file = join(dir, 'a.json');

    await writeFile(file, '{}');
    await watcher.handleFileEvent(file);
    await writeFile(file, '{"a":1}');
    await watcher.handleFileEvent(file);
    await rm(file);
    await watcher.handleFileEvent(file);

    expect(changes).toEqual([
      { kind: 'created', path: file, size: 2 },
      { kind: 'modified', path: file, size: 7 },
      { kind: 'deleted', path: file, size: undefined },
    ]);
  });

  it('expands directory events into their files', async () => {
    const sub = join(dir, 'set');
    await mkdir(sub);
    await writeFile(join(sub, 'b.json'), 'b');
    await writeFile(join(sub, 'a.json'), 'a');

    await watcher.handleFileEvent(sub);
    await rm(sub, { recursive: true });
    await watcher.handleFileEvent(sub);

    expect(changes.map(c => [c.kind, c.path])).toEqual([
      ['created', join(sub, 'a.json')],
      ['created', join(sub, 'b.json')],
      ['deleted', join(sub, 'a.json')],
      ['deleted', join(sub, 'b.json')],
    ]);
  });

  it('drops filtered files', async () => {
    const file = join(dir, 'draft.tmp');
    await writeFile(file, '');

    await watcher.handleFileEvent(file);

    expect(changes).toEqual([]);
    expect(rejected).toEqual([{ path: file, reason: 'ignored', detail: '*.tmp' }]);
  });

  it('ignores removal of paths it never saw', async () => {
    await watcher.handleFileEvent(join(dir, 'never.json'));
    expect(changes).toEqual([]);
  });

  it('creates missing directories and records existing files on start', async () => {
    const existing = join(dir, 'existing.json');
    await writeFile(existing, '{}');
    const missing = join(dir, 'missing');
    const started = new FolderWatcher({ paths: [dir, missing] });

    try {
      await started.start();

      expect((await stat(missing)).isDirectory()).toBe(true);
      expect(started.getWatchedPaths()).toEqual([dir, missing]);
      expect(started.knownFileCount).toBe(1);
      expect(started.running).toBe(true);
    } finally {
      started.stop();
    }
    expect(started.running).toBe(false);
  });

  describe('failures', () => {
    it('emits an error event for a failing file', async () => {
      const failing = new FolderWatcher({ paths: [dir], filter: new FailingFilter() });
      const errors: WatcherErrorEvent[] = [];
      failing.on('error', (event: WatcherErrorEvent) => errors.push(event));
      const file = join(dir, 'a.json');
      await writeFile(file, '{}');

      await failing.handleFileEvent(file);

      expect(errors).toHaveLength(1);
      expect(errors[0]?.path).toBe(file);
    });

    it('does not throw once its listeners are removed', async () => {
      const failing = new FolderWatcher({ paths: [dir], filter: new FailingFilter() });
      failing.on('error', () => undefined);
      failing.removeAllListeners();
      const file = join(dir, 'a.json');
      await writeFile(file, '{}');

      await expect(failing.handleFileEvent(file)).resolves.toBeUndefined();
    });
  });
});
