import { appendFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CompletionDetector } from '../src/detector.js';
import { FRAME_LENGTH, createMp3Buffer, createTempDir, removeTempDir, silentLogger } from './helpers.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

const INTERVAL = 50;

function createDetector(): CompletionDetector {
  return new CompletionDetector({ pollIntervalMs: INTERVAL, stabilizationCeilingMs: 2000, logger: silentLogger });
}

describe('CompletionDetector', () => {
  let dir: string;
  let detector: CompletionDetector;

  beforeEach(async () => {
    dir = await createTempDir();
    detector = createDetector();
  });

  afterEach(async () => {
    detector.stopWatching();
    await removeTempDir(dir);
  });

  describe('startWatching', () => {
    it('rejects a directory that does not exist', async () => {
      const result = await detector.startWatching({ directory: join(dir, 'missing'), extension: '.mp3' });

      expect(result.ok).toBe(false);

      if (!result.ok) {
        expect(result.error.kind).toBe('file-system-access');
        expect(result.error.stage).toBe('awaiting-file');
      }

      expect(detector.watching).toBe(false);
    });

    it('rejects a path that is not a directory', async () => {
      const file = join(dir, 'plain.txt');
      await writeFile(file, 'x');

      const result = await detector.startWatching({ directory: file, extension: '.mp3' });

      expect(result.ok).toBe(false);

      if (!result.ok) {
        expect(result.error.message).toBe(`${file} is not a directory`);
      }
    });

    it('rejects a directory it cannot write to', async () => {
      const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      vi.mocked(writeFile).mockRejectedValueOnce(denied);

      const result = await detector.startWatching({ directory: dir, extension: '.mp3' });

      expect(result.ok).toBe(false);

      if (!result.ok) {
        expect(result.error.kind).toBe('file-system-access');
        expect(result.error.message).toBe(`Watch directory is not writable: ${dir} (EACCES: permission denied)`);
      }

      expect(detector.watching).toBe(false);
    });

    it('returns the existing handle while active', async () => {
      const first = await detector.startWatching({ directory: dir, extension: 'MP3' });
      const second = await detector.startWatching({ directory: dir, extension: '.mp3' });

      expect(first.ok && second.ok).toBe(true);

      if (first.ok && second.ok) {
        expect(second.value).toBe(first.value);
        expect(first.value.target).toEqual({ directory: dir, extension: '.mp3' });
      }
    });

    it('creates nothing when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await detector.startWatching({ directory: dir, extension: '.mp3' }, { signal: controller.signal });

      expect(result.ok).toBe(false);

      if (!result.ok) {
        expect(result.error.kind).toBe('workflow-cancelled');
      }

      expect(detector.watching).toBe(false);
    });

    it('can be stopped repeatedly', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });

      detector.stopWatching();
      detector.stopWatching();

      expect(detector.watching).toBe(false);
    });
  });

  describe('awaitNewFile', () => {
    it('fails when not watching', async () => {
      const outcome = await detector.awaitNewFile(100);

      expect(outcome.status).toBe('failed');

      if (outcome.status === 'failed') {
        expect(outcome.error.kind).toBe('file-system-access');
      }
    });

    it('returns a new file once it has stopped growing', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });
      const path = join(dir, 'download.mp3');

      const waiting = detector.awaitNewFile(5000);

      // Starts empty and grows to 4170 bytes.
      await writeFile(path, '');

      for (let chunk = 0; chunk < 10; chunk++) {
        await delay(20);
        await appendFile(path, createMp3Buffer(1));
      }

      const lastWrite = Date.now();
      const outcome = await waiting;

      expect(outcome).toEqual({ status: 'stable', path });
      expect((await stat(path)).size).toBe(10 * FRAME_LENGTH);
      expect(Date.now() - lastWrite).toBeGreaterThanOrEqual(3 * INTERVAL - 5);
    });

    it('ignores files with another extension', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });
      await writeFile(join(dir, 'cover.jpg'), createMp3Buffer());

      const outcome = await detector.awaitNewFile(400);

      expect(outcome).toEqual({ status: 'not-found' });
    });

    it('reports a file that vanishes before it settles', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });
      const path = join(dir, 'partial.mp3');

      const waiting = detector.awaitNewFile(1000);
      await writeFile(path, createMp3Buffer());
      await delay(20);
      await rm(path);

      const outcome = await waiting;

      expect(outcome.status).toBe('failed');

      if (outcome.status === 'failed') {
        expect(outcome.error.kind).toBe('file-system-access');
      }
    });

    it('returns cancelled when the signal aborts', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });

      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      const outcome = await detector.awaitNewFile(5000, controller.signal);

      expect(outcome).toEqual({ status: 'cancelled' });
    });
  });

  describe('collectCompleted', () => {
    it('returns every detected file that settles', async () => {
      await detector.startWatching({ directory: dir, extension: '.mp3' });
      const first = join(dir, 'first.mp3');
      const second = join(dir, 'second.mp3');

      await writeFile(first, createMp3Buffer());
      await writeFile(second, createMp3Buffer());
      await delay(200);

      const completed = await detector.collectCompleted();

      expect([...completed].sort()).toEqual([first, second]);
      expect(await detector.collectCompleted()).toEqual([]);
    });
  });

  describe('recentFiles', () => {
    it('returns nothing before any directory was watched', async () => {
      expect(await detector.recentFiles(60_000)).toEqual([]);
    });

    it('lists matching files newest first, even after stopping', async () => {
      await writeFile(join(dir, 'older.mp3'), createMp3Buffer());
      await delay(30);
      await writeFile(join(dir, 'newer.MP3'), createMp3Buffer());
      await writeFile(join(dir, 'notes.txt'), 'x');

      await detector.startWatching({ directory: dir, extension: '.mp3' });
      detector.stopWatching();

      expect(await detector.recentFiles(60_000)).toEqual([join(dir, 'newer.MP3'), join(dir, 'older.mp3')]);
    });

    it('excludes files created before the lookback window', async () => {
      await writeFile(join(dir, 'old.mp3'), createMp3Buffer());
      await detector.startWatching({ directory: dir, extension: '.mp3' });
      await delay(20);

      expect(await detector.recentFiles(0)).toEqual([]);
    });
  });
});
