import { watch, type FSWatcher, type Stats } from 'node:fs';
import { readdir, stat, unlink, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { linkAbort } from './abort.js';
import { normalizeExtension } from './config.js';
import { AsyncQueue, DetectedFileRegistry } from './detected-files.js';
import { ClassifiedError, errorCode, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { pollsForCeiling, waitForStable, type StabilizeOutcome } from './stabilizer.js';
import type { DetectionOutcome, Result, WatchHandle, WatchTarget } from './types.js';

const WAIT_SLICE_MS = 500;
const FRESH_FILE_WINDOW_MS = 5 * 60 * 1000;

export interface DetectorOptions {
  pollIntervalMs?: number;
  stabilizationCeilingMs?: number;
  logger?: Logger;
}

interface ActiveWatch {
  handle: WatchHandle;
  watcher: FSWatcher;
}

function createdAtMs(stats: Stats): number {
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

function accessError(message: string, cause?: unknown): ClassifiedError {
  return new ClassifiedError('file-system-access', message, 'awaiting-file', { cause });
}

export class CompletionDetector {
  private readonly registry = new DetectedFileRegistry();
  private readonly detections = new AsyncQueue<string>();
  private readonly pollIntervalMs: number;
  private readonly stabilizationCeilingMs: number;
  private readonly logger: Logger;
  private active: ActiveWatch | null = null;
  private lastTarget: WatchTarget | null = null;

  constructor(options: DetectorOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.stabilizationCeilingMs = options.stabilizationCeilingMs ?? 30_000;
    this.logger = options.logger ?? createLogger('detector');
  }

  get watching(): boolean {
    return this.active !== null;
  }

  get target(): WatchTarget | null {
    return this.active?.handle.target ?? this.lastTarget;
  }

  async startWatching(target: WatchTarget, options: { signal?: AbortSignal } = {}): Promise<Result<WatchHandle>> {
    if (this.active) {
      if (this.active.handle.target.directory !== target.directory) {
        this.logger.warn(`Already watching ${this.active.handle.target.directory}; ignoring ${target.directory}`);
      }

      return { ok: true, value: this.active.handle };
    }

    const normalized: WatchTarget = {
      directory: target.directory,
      extension: normalizeExtension(target.extension),
    };

    const access = await this.probeDirectory(normalized.directory);

    if (!access.ok) {
      return access;
    }

    if (options.signal?.aborted) {
      return {
        ok: false,
        error: new ClassifiedError('workflow-cancelled', 'Watching was cancelled before it started', 'awaiting-file'),
      };
    }

    // The probe awaited; another caller may have started meanwhile.
    const self = this;
    if (self.active) {
      return { ok: true, value: self.active.handle };
    }

    let watcher: FSWatcher;

    try {
      watcher = watch(normalized.directory, { persistent: false }, (eventType, filename) => {
        if (filename) {
          this.onEvent(normalized, eventType, filename);
        }
      });
    } catch (error) {
      return {
        ok: false,
        error: accessError(`Could not watch ${normalized.directory}: ${errorMessage(error)}`, error),
      };
    }

    watcher.on('error', (error) => {
      this.logger.warn(`Watcher error on ${normalized.directory}: ${errorMessage(error)}`);
    });

    const handle: WatchHandle = { target: normalized, startedAt: Date.now() };
    this.active = { handle, watcher };
    this.lastTarget = normalized;
    this.logger.info(`Watching ${normalized.directory} for new ${normalized.extension} files`);

    return { ok: true, value: handle };
  }

  stopWatching(): void {
    if (this.active) {
      this.active.watcher.close();
      this.logger.debug(`Stopped watching ${this.active.handle.target.directory}`);
      this.active = null;
    }

    this.registry.clear();
    this.detections.clear();
  }

  async awaitNewFile(timeoutMs: number, signal?: AbortSignal): Promise<DetectionOutcome> {
    if (!this.active) {
      return {
        status: 'failed',
        error: accessError('Download monitoring is not active. Call startWatching() first.'),
      };
    }

    const link = linkAbort(signal, timeoutMs);
    const trackers = new Map<string, StabilizeOutcome | null>();
    const failures: ClassifiedError[] = [];

    const track = (path: string): void => {
      if (trackers.has(path)) {
        return;
      }

      trackers.set(path, null);

      this.stabilize(path, link.signal)
        .then((outcome) => {
          trackers.set(path, outcome);

          if (outcome.status === 'failed') {
            failures.push(outcome.error);
            this.logger.warn(outcome.error.message);
          }

          this.detections.wake();
        })
        .catch((error: unknown) => {
          failures.push(accessError(`Stabilization of ${path} failed: ${errorMessage(error)}`, error));
          trackers.set(path, { status: 'aborted' });
        });
    };

    try {
      while (!link.signal.aborted) {
        this.detections.drain();

        for (const path of this.registry.pending()) {
          track(path);
        }

        for (const [path, outcome] of trackers) {
          if (outcome?.status === 'stable') {
            this.registry.markStabilized(path);
            this.logger.info(`Download complete: ${path}`);
            return { status: 'stable', path };
          }
        }

        await this.detections.wait(WAIT_SLICE_MS, link.signal);
      }
    } finally {
      link.abort();
      link.dispose();
    }

    if (signal?.aborted) {
      return { status: 'cancelled' };
    }

    const [firstFailure] = failures;
    return firstFailure ? { status: 'failed', error: firstFailure } : { status: 'not-found' };
  }

  async collectCompleted(signal?: AbortSignal): Promise<string[]> {
    const pending = this.registry.pending();

    const outcomes = await Promise.all(
      pending.map(async (path) => ({ path, outcome: await this.stabilize(path, signal) }))
    );

    const completed: string[] = [];

    for (const { path, outcome } of outcomes) {
      if (outcome.status === 'stable') {
        this.registry.markStabilized(path);
        completed.push(path);
      }
    }

    return completed;
  }

  async recentFiles(lookbackMs: number): Promise<string[]> {
    const target = this.target;

    if (!target) {
      return [];
    }

    const cutoff = Date.now() - lookbackMs;
    let names: string[];

    try {
      names = await readdir(target.directory);
    } catch (error) {
      this.logger.warn(`Could not scan ${target.directory}: ${errorMessage(error)}`);
      return [];
    }

    const recent: Array<{ path: string; createdAt: number }> = [];

    for (const name of names) {
      if (extname(name).toLowerCase() !== target.extension) {
        continue;
      }

      const path = join(target.directory, name);

      try {
        const stats = await stat(path);
        const createdAt = createdAtMs(stats);

        if (stats.isFile() && createdAt > cutoff) {
          recent.push({ path, createdAt });
        }
      } catch (error) {
        this.logger.debug(`Skipping ${name}: ${errorMessage(error)}`);
      }
    }

    return recent
      .sort((a, b) => b.createdAt - a.createdAt)
      .map((file) => file.path);
  }

  private stabilize(path: string, signal?: AbortSignal): Promise<StabilizeOutcome> {
    return waitForStable(path, {
      pollIntervalMs: this.pollIntervalMs,
      maxPolls: pollsForCeiling(this.stabilizationCeilingMs, this.pollIntervalMs),
      signal,
      logger: this.logger,
    });
  }

  private async probeDirectory(directory: string): Promise<Result<void>> {
    try {
      const stats = await stat(directory);

      if (!stats.isDirectory()) {
        return { ok: false, error: accessError(`${directory} is not a directory`) };
      }
    } catch (error) {
      return {
        ok: false,
        error: accessError(`Watch directory is not accessible: ${directory} (${errorMessage(error)})`, error),
      };
    }

    const marker = join(directory, `.download-tagger-probe-${process.pid}-${Date.now()}`);

    try {
      await writeFile(marker, 'probe');
      await unlink(marker);
    } catch (error) {
      return {
        ok: false,
        error: accessError(`Watch directory is not writable: ${directory} (${errorMessage(error)})`, error),
      };
    }

    return { ok: true, value: undefined };
  }

  private onEvent(target: WatchTarget, eventType: string, filename: string): void {
    if (extname(filename).toLowerCase() !== target.extension) {
      return;
    }

    const path = join(target.directory, filename);

    if (this.registry.has(path)) {
      return;
    }

    this.inspect(path, eventType === 'change').catch((error: unknown) => {
      this.logger.warn(`Could not inspect ${path}: ${errorMessage(error)}`);
    });
  }

  private async inspect(path: string, modifiedOnly: boolean): Promise<void> {
    let stats: Stats;

    try {
      stats = await stat(path);
    } catch (error) {
      // A rename event also fires when a file leaves the directory.
      if (errorCode(error) === 'ENOENT') {
        return;
      }

      throw error;
    }

    if (!stats.isFile() || !this.active) {
      return;
    }

    if (modifiedOnly && Date.now() - createdAtMs(stats) >= FRESH_FILE_WINDOW_MS) {
      return;
    }

    if (this.registry.add(path)) {
      this.logger.debug(`Detected new file: ${path}`);
      this.detections.push(path);
    }
  }
}
