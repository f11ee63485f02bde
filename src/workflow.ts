import type { CompletionDetector } from './detector.js';
import { ClassifiedError, MAX_RETRY_ATTEMPTS, shouldRetry, toClassifiedError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { MonotonicProgress, silentProgress } from './progress.js';
import { validateRequest } from './request.js';
import { ResourceScope } from './scope.js';
import type { TagMutationEngine } from './tag-engine.js';
import type {
  Config,
  DownloadRequest,
  ProgressSink,
  RemoteTrigger,
  Result,
  WorkflowReport,
  WorkflowRun,
  WorkflowState,
  WorkflowStatus,
} from './types.js';

export type FileDetector = Pick<
  CompletionDetector,
  'startWatching' | 'stopWatching' | 'awaitNewFile' | 'recentFiles' | 'watching'
>;

export type MetadataEngine = Pick<TagMutationEngine, 'applyFields'>;

export interface WorkflowOptions {
  trigger: RemoteTrigger;
  detector: FileDetector;
  engine: MetadataEngine;
  config: Config;
  progress?: ProgressSink;
  logger?: Logger;
}

const TRANSITIONS: Record<WorkflowState, readonly WorkflowState[]> = {
  idle: ['triggering'],
  triggering: ['awaiting-file', 'failed'],
  'awaiting-file': ['mutating', 'failed'],
  mutating: ['succeeded', 'failed'],
  succeeded: ['triggering'],
  failed: ['triggering'],
};

const IN_FLIGHT: ReadonlySet<WorkflowState> = new Set<WorkflowState>(['triggering', 'awaiting-file', 'mutating']);

interface RunOutcome {
  filePath: string | null;
  error: ClassifiedError | null;
}

interface ActiveRun {
  runId: number;
  request: DownloadRequest;
  attempt: number;
  startedAt: Date;
  controller: AbortController;
  scope: ResourceScope;
  progress: MonotonicProgress;
  cancelling: boolean;
  settled: boolean;
  finished: Promise<void>;
  resolve: (report: WorkflowReport) => void;
}

function inputError(message: string): Result<never> {
  return { ok: false, error: new ClassifiedError('input-validation', message, 'input') };
}

function cancelledError(): ClassifiedError {
  return new ClassifiedError('workflow-cancelled', 'Workflow was cancelled', 'workflow');
}

/**
 * Runs one download at a time: arm the detector, trigger the remote
 * conversion, wait for the file to settle, then rewrite its tags.
 */
export class WorkflowOrchestrator {
  private readonly trigger: RemoteTrigger;
  private readonly detector: FileDetector;
  private readonly engine: MetadataEngine;
  private readonly config: Config;
  private readonly sink: ProgressSink;
  private readonly logger: Logger;

  private current: WorkflowState = 'idle';
  private active: ActiveRun | null = null;
  private nextRunId = 1;
  private lastRequest: DownloadRequest | null = null;
  private lastAttempt = 0;
  private lastReport: WorkflowReport | null = null;

  constructor(options: WorkflowOptions) {
    this.trigger = options.trigger;
    this.detector = options.detector;
    this.engine = options.engine;
    this.config = options.config;
    this.sink = options.progress ?? silentProgress;
    this.logger = options.logger ?? createLogger('workflow');
  }

  get state(): WorkflowState {
    return this.current;
  }

  submit(request: DownloadRequest): Result<WorkflowRun> {
    if (this.isInFlight()) {
      return { ok: false, error: this.busyError() };
    }

    const validated = validateRequest(request);

    if (!validated.ok) {
      return validated;
    }

    return { ok: true, value: this.start(validated.value, 1) };
  }

  retry(): Result<WorkflowRun> {
    if (this.isInFlight()) {
      return { ok: false, error: this.busyError() };
    }

    const request = this.lastRequest;
    const report = this.lastReport;

    if (!request || !report) {
      return inputError('Nothing to retry: no download has been submitted');
    }

    if (report.state === 'succeeded' || !report.error) {
      return inputError('Nothing to retry: the last download succeeded');
    }

    if (!report.error.retryable) {
      return inputError(`The last failure (${report.error.kind}) cannot be retried`);
    }

    if (!shouldRetry(report.error, this.lastAttempt, MAX_RETRY_ATTEMPTS)) {
      return inputError(`Giving up after ${this.lastAttempt} attempts`);
    }

    this.logger.info(`Retrying download (attempt ${this.lastAttempt + 1}/${MAX_RETRY_ATTEMPTS})`);
    return { ok: true, value: this.start(request, this.lastAttempt + 1) };
  }

  /**
   * Aborts the active run and waits for its worker to finish. A run already
   * writing tags is not interrupted; its report says how the write ended.
   * Resolves `true` when nothing was running or every resource was released.
   */
  async cancel(): Promise<boolean> {
    const run = this.active;

    if (!run || run.settled) {
      return true;
    }

    if (!run.cancelling) {
      this.logger.warn(`Cancelling run ${run.runId}`);
    }

    run.cancelling = true;
    run.controller.abort();

    const clean = await run.scope.close();
    await run.finished;

    return clean;
  }

  status(): WorkflowStatus {
    const run = this.active;
    const startedAt = run ? run.startedAt.toISOString() : this.lastReport?.startedAt ?? null;
    let elapsedMs = 0;

    if (run) {
      elapsedMs = Date.now() - run.startedAt.getTime();
    } else if (this.lastReport) {
      elapsedMs = Date.parse(this.lastReport.finishedAt) - Date.parse(this.lastReport.startedAt);
    }

    return {
      state: this.current,
      attempt: run?.attempt ?? this.lastAttempt,
      startedAt,
      elapsedMs,
      watching: this.detector.watching,
    };
  }

  async shutdown(): Promise<boolean> {
    const clean = await this.cancel();

    this.detector.stopWatching();
    await this.trigger.close();

    return clean;
  }

  private isInFlight(): boolean {
    return IN_FLIGHT.has(this.current);
  }

  private busyError(): ClassifiedError {
    return new ClassifiedError(
      'workflow-already-running',
      `A download is already in progress (${this.current})`,
      'workflow'
    );
  }

  private transition(next: WorkflowState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal workflow transition: ${this.current} -> ${next}`);
    }

    this.logger.debug(`${this.current} -> ${next}`);
    this.current = next;
  }

  private start(request: DownloadRequest, attempt: number): WorkflowRun {
    this.transition('triggering');

    let resolve: (report: WorkflowReport) => void = () => {};
    const completion = new Promise<WorkflowReport>((res) => {
      resolve = res;
    });

    const run: ActiveRun = {
      runId: this.nextRunId++,
      request,
      attempt,
      startedAt: new Date(),
      controller: new AbortController(),
      scope: new ResourceScope(this.logger),
      progress: new MonotonicProgress(this.sink),
      cancelling: false,
      settled: false,
      finished: Promise.resolve(),
      resolve,
    };

    this.active = run;
    this.lastRequest = request;
    this.lastAttempt = attempt;

    this.logger.info(`Run ${run.runId}: ${request.fields.artist} - ${request.fields.title} (attempt ${attempt})`);
    run.finished = this.drive(run).catch((error: unknown) => {
      this.logger.error(`Run ${run.runId} stopped unexpectedly`, error);
    });

    return { runId: run.runId, completion };
  }

  private async drive(run: ActiveRun): Promise<void> {
    let outcome: RunOutcome;

    try {
      outcome = await this.execute(run);
    } catch (error) {
      outcome = { filePath: null, error: toClassifiedError(error, 'mutation-failed', 'workflow') };
    }

    // Once mutating, the engine's result stands even if a cancel arrived.
    if (run.cancelling && outcome.error && this.current !== 'mutating') {
      outcome = { filePath: outcome.filePath, error: cancelledError() };
    }

    await run.scope.close();
    this.settle(run, outcome);
  }

  private async execute(run: ActiveRun): Promise<RunOutcome> {
    const { signal } = run.controller;
    const { fields, sourceUrl } = run.request;
    const config = this.config;

    run.progress.report('Starting download', 0);

    const watch = await this.detector.startWatching(
      { directory: config.watchDirectory, extension: config.targetExtension },
      { signal }
    );

    if (!watch.ok) {
      return { filePath: null, error: watch.error };
    }

    await run.scope.defer('file detector', () => this.detector.stopWatching());
    await run.scope.defer('remote trigger', () => this.trigger.close());

    if (signal.aborted) {
      return { filePath: null, error: cancelledError() };
    }

    const opened = await this.trigger.open();

    if (!opened.ok) {
      return { filePath: null, error: opened.error };
    }

    run.progress.report('Converter ready', 10);

    const converted = await this.trigger.performRemoteConversion(sourceUrl, signal);

    if (!converted.ok) {
      return { filePath: null, error: converted.error };
    }

    if (signal.aborted) {
      return { filePath: null, error: cancelledError() };
    }

    run.progress.report('Remote conversion complete', 30);
    this.transition('awaiting-file');
    run.progress.report('Waiting for download to finish', 40);

    const detection = await this.detector.awaitNewFile(config.downloadTimeoutSeconds * 1000, signal);

    if (detection.status === 'cancelled' || signal.aborted) {
      return { filePath: null, error: cancelledError() };
    }

    let filePath = detection.status === 'stable' ? detection.path : null;

    if (!filePath) {
      const [newest] = await this.detector.recentFiles(config.fallbackLookbackMinutes * 60_000);

      if (newest) {
        this.logger.warn(`No completed download detected; using the most recent file ${newest}`);
        filePath = newest;
      }
    }

    if (!filePath) {
      const error = detection.status === 'failed'
        ? detection.error
        : new ClassifiedError(
            'download-timeout',
            `No new ${config.targetExtension} file appeared in ${config.watchDirectory} within ` +
              `${config.downloadTimeoutSeconds} seconds`,
            'awaiting-file'
          );

      return { filePath: null, error };
    }

    if (signal.aborted) {
      return { filePath, error: cancelledError() };
    }

    this.transition('mutating');
    run.progress.report('Applying metadata', 80);

    const applied = await this.engine.applyFields(filePath, fields);

    return { filePath, error: applied.ok ? null : applied.error };
  }

  private settle(run: ActiveRun, outcome: RunOutcome): void {
    if (run.settled) {
      return;
    }

    run.settled = true;

    const state = outcome.error ? 'failed' : 'succeeded';
    this.transition(state);

    if (outcome.error) {
      run.progress.fail(outcome.error);

      if (outcome.error.critical) {
        this.logger.error(outcome.error.userMessage);
      } else {
        this.logger.warn(outcome.error.userMessage);
      }
    } else {
      run.progress.report('Done', 100);
      this.logger.info(`Run ${run.runId} tagged ${outcome.filePath ?? ''}`);
    }

    const report: WorkflowReport = {
      runId: run.runId,
      state,
      filePath: outcome.filePath,
      error: outcome.error,
      attempt: run.attempt,
      startedAt: run.startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
    };

    this.lastReport = report;
    this.active = null;
    run.resolve(report);
  }
}
