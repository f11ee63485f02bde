import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CompletionDetector } from '../src/detector.js';
import { ClassifiedError } from '../src/errors.js';
import { TagMutationEngine } from '../src/tag-engine.js';
import type { Config, DownloadRequest, Result } from '../src/types.js';
import { WorkflowOrchestrator, type MetadataEngine } from '../src/workflow.js';
import {
  FakeTrigger,
  RecordingProgress,
  createTempDir,
  removeTempDir,
  silentLogger,
  testConfig,
  untilAborted,
  writeMp3,
} from './helpers.js';

const REQUEST: DownloadRequest = {
  sourceUrl: 'https://example.com/watch?v=test',
  fields: { artist: 'Artist', title: 'Title', album: 'Album', trackNumber: 3 },
};

const OK: Result<void> = { ok: true, value: undefined };

function failure(kind: 'remote-unreachable' | 'remote-element-missing' | 'remote-automation-unavailable'): Result<void> {
  return { ok: false, error: new ClassifiedError(kind, `${kind} happened`, 'triggering') };
}

interface Harness {
  workflow: WorkflowOrchestrator;
  detector: CompletionDetector;
  engine: TagMutationEngine;
  progress: RecordingProgress;
}

describe('WorkflowOrchestrator', () => {
  let dir: string;
  let harness: Harness | null;

  beforeEach(async () => {
    dir = await createTempDir();
    harness = null;
  });

  afterEach(async () => {
    await harness?.workflow.shutdown();
    await removeTempDir(dir);
  });

  function setup(trigger: FakeTrigger, options: { config?: Partial<Config>; engine?: MetadataEngine } = {}): Harness {
    const config = testConfig(dir, options.config);
    const detector = new CompletionDetector({
      pollIntervalMs: config.pollIntervalMs,
      stabilizationCeilingMs: config.stabilizationCeilingSeconds * 1000,
      logger: silentLogger,
    });
    const engine = new TagMutationEngine({ logger: silentLogger });
    const progress = new RecordingProgress();
    const workflow = new WorkflowOrchestrator({
      trigger,
      detector,
      engine: options.engine ?? engine,
      config,
      progress,
      logger: silentLogger,
    });

    harness = { workflow, detector, engine, progress };
    return harness;
  }

  function converterWriting(name: string): FakeTrigger {
    return new FakeTrigger(async () => {
      await writeMp3(join(dir, name));
      return OK;
    });
  }

  it('downloads, detects and tags the new file', async () => {
    const trigger = converterWriting('converted.mp3');
    const { workflow, detector, engine, progress } = setup(trigger);

    const run = workflow.submit(REQUEST);

    expect(run.ok).toBe(true);
    expect(workflow.state).toBe('triggering');

    if (!run.ok) {
      return;
    }

    const report = await run.value.completion;

    expect(report).toMatchObject({
      runId: run.value.runId,
      state: 'succeeded',
      filePath: join(dir, 'converted.mp3'),
      error: null,
      attempt: 1,
    });
    expect(workflow.state).toBe('succeeded');
    expect(progress.percents).toEqual([0, 10, 30, 40, 80, 100]);
    expect(progress.failures).toEqual([]);
    expect(trigger.conversions).toEqual([REQUEST.sourceUrl]);
    expect(trigger.closed).toBe(1);
    expect(detector.watching).toBe(false);

    const tags = await engine.readFields(join(dir, 'converted.mp3'));
    expect(tags).toEqual({ ok: true, value: { TPE1: 'Artist', TIT2: 'Title', TALB: 'Album', TRCK: '3' } });
    expect(await readdir(dir)).toEqual(['converted.mp3']);
  });

  it('rejects invalid input without side effects', () => {
    const trigger = converterWriting('never.mp3');
    const { workflow } = setup(trigger);

    const run = workflow.submit({ sourceUrl: 'not-a-url', fields: REQUEST.fields });

    expect(run.ok).toBe(false);

    if (!run.ok) {
      expect(run.error.kind).toBe('input-validation');
    }

    expect(workflow.state).toBe('idle');
    expect(trigger.opened).toBe(0);
  });

  it('runs one download at a time and can be cancelled', async () => {
    let converting: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      converting = resolve;
    });
    const trigger = new FakeTrigger(async (_url, signal) => {
      converting();
      await untilAborted(signal);
      return { ok: false, error: new ClassifiedError('workflow-cancelled', 'stopped', 'triggering') };
    });
    const { workflow, detector, progress } = setup(trigger);

    const first = workflow.submit(REQUEST);
    await started;

    expect(detector.watching).toBe(true);
    expect(workflow.status()).toMatchObject({ state: 'triggering', attempt: 1, watching: true });

    const second = workflow.submit(REQUEST);

    expect(second.ok).toBe(false);

    if (!second.ok) {
      expect(second.error.kind).toBe('workflow-already-running');
    }

    expect(await workflow.cancel()).toBe(true);
    expect(workflow.state).toBe('failed');
    expect(detector.watching).toBe(false);
    expect(trigger.closed).toBe(1);

    if (first.ok) {
      const report = await first.value.completion;

      expect(report.state).toBe('failed');
      expect(report.error?.kind).toBe('workflow-cancelled');
    }

    expect(progress.failures).toHaveLength(1);
    expect(progress.percents).toEqual([0, 10]);
    expect(trigger.conversions).toEqual([REQUEST.sourceUrl]);
  });

  it('lets a tag write in progress finish before cancel returns', async () => {
    const events: string[] = [];
    let mutating: () => void = () => {};
    let finishMutation: () => void = () => {};
    const mutationStarted = new Promise<void>((resolve) => {
      mutating = resolve;
    });
    const mutationReleased = new Promise<void>((resolve) => {
      finishMutation = resolve;
    });
    const engine: MetadataEngine = {
      applyFields: async (filePath) => {
        events.push('mutation-start');
        mutating();
        await mutationReleased;
        events.push('mutation-end');
        return { ok: true, value: { targetPath: filePath, backupPath: null, originalSize: 0, outcome: 'verified' } };
      },
    };
    const { workflow, detector } = setup(converterWriting('converted.mp3'), { engine });

    const first = workflow.submit(REQUEST);
    await mutationStarted;

    const cancelling = workflow.cancel().then((clean) => {
      events.push('cancel-returned');
      return clean;
    });
    const second = workflow.submit(REQUEST);

    expect(second.ok).toBe(false);

    if (!second.ok) {
      expect(second.error.kind).toBe('workflow-already-running');
    }

    expect(workflow.state).toBe('mutating');

    finishMutation();

    expect(await cancelling).toBe(true);
    expect(events).toEqual(['mutation-start', 'mutation-end', 'cancel-returned']);
    expect(workflow.state).toBe('succeeded');
    expect(detector.watching).toBe(false);

    if (first.ok) {
      expect(await first.value.completion).toMatchObject({
        state: 'succeeded',
        filePath: join(dir, 'converted.mp3'),
        error: null,
      });
    }
  });

  it('returns true from cancel when nothing is running', async () => {
    const { workflow } = setup(converterWriting('unused.mp3'));

    expect(await workflow.cancel()).toBe(true);
    expect(workflow.state).toBe('idle');
  });

  it('fails with the trigger error and releases everything', async () => {
    const trigger = new FakeTrigger(async () => failure('remote-unreachable'));
    const { workflow, detector, progress } = setup(trigger);

    const run = workflow.submit(REQUEST);

    if (!run.ok) {
      throw run.error;
    }

    const report = await run.value.completion;

    expect(report.state).toBe('failed');
    expect(report.filePath).toBeNull();
    expect(report.error?.kind).toBe('remote-unreachable');
    expect(progress.failures).toEqual([report.error]);
    expect(progress.percents).toEqual([0, 10]);
    expect(detector.watching).toBe(false);
    expect(trigger.closed).toBe(1);
  });

  it('reports a converter that cannot be opened', async () => {
    const trigger = new FakeTrigger(async () => OK, async () => failure('remote-automation-unavailable'));
    const { workflow } = setup(trigger);

    const run = workflow.submit(REQUEST);

    if (!run.ok) {
      throw run.error;
    }

    const report = await run.value.completion;

    expect(report.error?.kind).toBe('remote-automation-unavailable');
    expect(trigger.conversions).toEqual([]);
  });

  it('times out when no file appears', async () => {
    const trigger = new FakeTrigger(async () => OK);
    const { workflow, progress } = setup(trigger, { config: { downloadTimeoutSeconds: 0.3 } });

    const run = workflow.submit(REQUEST);

    if (!run.ok) {
      throw run.error;
    }

    const report = await run.value.completion;

    expect(report.state).toBe('failed');
    expect(report.error?.kind).toBe('download-timeout');
    expect(report.error?.message).toBe(`No new .mp3 file appeared in ${dir} within 0.3 seconds`);
    expect(progress.percents).toEqual([0, 10, 30, 40]);
  });

  it('falls back to the newest recent file when nothing is detected', async () => {
    const existing = join(dir, 'already-there.mp3');
    await writeMp3(existing);

    const trigger = new FakeTrigger(async () => OK);
    const { workflow, engine } = setup(trigger, { config: { downloadTimeoutSeconds: 0.3 } });

    const run = workflow.submit(REQUEST);

    if (!run.ok) {
      throw run.error;
    }

    const report = await run.value.completion;

    expect(report.state).toBe('succeeded');
    expect(report.filePath).toBe(existing);
    expect(await engine.readFields(existing)).toEqual({
      ok: true,
      value: { TPE1: 'Artist', TIT2: 'Title', TALB: 'Album', TRCK: '3' },
    });
  });

  it('passes mutation failures through unchanged', async () => {
    const restoreFailed = new ClassifiedError('restore-failed', 'backup kept', 'mutating', {
      backupPath: join(dir, 'converted.mp3.backup.1'),
    });
    const engine: MetadataEngine = {
      applyFields: async () => ({ ok: false, error: restoreFailed }),
    };
    const { workflow, progress } = setup(converterWriting('converted.mp3'), { engine });

    const run = workflow.submit(REQUEST);

    if (!run.ok) {
      throw run.error;
    }

    const report = await run.value.completion;

    expect(report.error).toBe(restoreFailed);
    expect(report.filePath).toBe(join(dir, 'converted.mp3'));
    expect(progress.percents).toEqual([0, 10, 30, 40, 80]);
    expect(progress.failures).toEqual([restoreFailed]);
  });

  describe('retry', () => {
    it('refuses when nothing was submitted', () => {
      const { workflow } = setup(new FakeTrigger());
      const result = workflow.retry();

      expect(result.ok).toBe(false);

      if (!result.ok) {
        expect(result.error.kind).toBe('input-validation');
        expect(result.error.message).toBe('Nothing to retry: no download has been submitted');
      }
    });

    it('resubmits the last request after a retryable failure', async () => {
      let calls = 0;
      const trigger = new FakeTrigger(async () => {
        calls++;

        if (calls === 1) {
          return failure('remote-element-missing');
        }

        await writeMp3(join(dir, 'second-try.mp3'));
        return OK;
      });
      const { workflow } = setup(trigger);

      const first = workflow.submit(REQUEST);

      if (!first.ok) {
        throw first.error;
      }

      expect((await first.value.completion).state).toBe('failed');

      const second = workflow.retry();

      if (!second.ok) {
        throw second.error;
      }

      const report = await second.value.completion;

      expect(report).toMatchObject({ state: 'succeeded', attempt: 2, filePath: join(dir, 'second-try.mp3') });
      expect(second.value.runId).toBe(first.value.runId + 1);

      const again = workflow.retry();

      expect(again.ok).toBe(false);

      if (!again.ok) {
        expect(again.error.message).toBe('Nothing to retry: the last download succeeded');
      }
    });

    it('stops after three attempts', async () => {
      const trigger = new FakeTrigger(async () => failure('remote-unreachable'));
      const { workflow } = setup(trigger);

      let run = workflow.submit(REQUEST);

      for (let attempt = 1; attempt <= 3; attempt++) {
        if (!run.ok) {
          throw run.error;
        }

        await run.value.completion;

        if (attempt < 3) {
          run = workflow.retry();
        }
      }

      const refused = workflow.retry();

      expect(refused.ok).toBe(false);

      if (!refused.ok) {
        expect(refused.error.message).toBe('Giving up after 3 attempts');
      }

      expect(trigger.conversions).toHaveLength(3);
      expect(workflow.status().attempt).toBe(3);
    });

    it('refuses errors that are not retryable', async () => {
      const trigger = new FakeTrigger(async () => OK, async () => failure('remote-automation-unavailable'));
      const { workflow } = setup(trigger);

      const run = workflow.submit(REQUEST);

      if (!run.ok) {
        throw run.error;
      }

      await run.value.completion;
      const refused = workflow.retry();

      expect(refused.ok).toBe(false);

      if (!refused.ok) {
        expect(refused.error.message).toBe('The last failure (remote-automation-unavailable) cannot be retried');
      }
    });
  });

  it('shuts down a running download', async () => {
    let converting: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      converting = resolve;
    });
    const trigger = new FakeTrigger(async (_url, signal) => {
      converting();
      await untilAborted(signal);
      return failure('remote-unreachable');
    });
    const { workflow, detector } = setup(trigger);

    const run = workflow.submit(REQUEST);
    await started;

    expect(await workflow.shutdown()).toBe(true);
    expect(workflow.state).toBe('failed');
    expect(detector.watching).toBe(false);

    if (run.ok) {
      expect((await run.value.completion).error?.kind).toBe('workflow-cancelled');
    }
  });
});
