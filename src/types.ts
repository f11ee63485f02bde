import type { ClassifiedError } from './errors.js';
import type { LogLevel } from './logger.js';

export type Result<T> = { ok: true; value: T } | { ok: false; error: ClassifiedError };

export interface MetadataFields {
  artist: string;
  title: string;
  album: string;
  trackNumber: number;
}

export interface DownloadRequest {
  sourceUrl: string;
  fields: MetadataFields;
}

// Frame id -> flattened value, e.g. { TPE1: 'Artist', COMM: 'hello' }
export type TagMap = Record<string, string>;

export interface WatchTarget {
  readonly directory: string;
  readonly extension: string;
}

export interface WatchHandle {
  readonly target: WatchTarget;
  readonly startedAt: number;
}

export interface DetectedFile {
  path: string;
  firstSeenAt: number;
  stabilized: boolean;
}

export type DetectionOutcome =
  | { status: 'stable'; path: string }
  | { status: 'not-found' }
  | { status: 'failed'; error: ClassifiedError }
  | { status: 'cancelled' };

export type MutationOutcome =
  | 'unstarted'
  | 'validated'
  | 'backed-up'
  | 'written'
  | 'verified'
  | 'rolled-back'
  | 'restore-failed';

export interface MutationAttempt {
  targetPath: string;
  backupPath: string | null;
  originalSize: number;
  outcome: MutationOutcome;
}

export type WorkflowState =
  | 'idle'
  | 'triggering'
  | 'awaiting-file'
  | 'mutating'
  | 'succeeded'
  | 'failed';

export interface WorkflowReport {
  runId: number;
  state: 'succeeded' | 'failed';
  filePath: string | null;
  error: ClassifiedError | null;
  attempt: number;
  startedAt: string;
  finishedAt: string;
}

export interface WorkflowRun {
  runId: number;
  completion: Promise<WorkflowReport>;
}

export interface WorkflowStatus {
  state: WorkflowState;
  attempt: number;
  startedAt: string | null;
  elapsedMs: number;
  watching: boolean;
}

export interface ProgressSink {
  report(message: string, percent: number): void;
  fail(error: ClassifiedError): void;
}

export interface RemoteTrigger {
  open(): Promise<Result<void>>;
  performRemoteConversion(sourceUrl: string, signal?: AbortSignal): Promise<Result<void>>;
  close(): Promise<void>;
}

export interface ConverterConfig {
  command: string;
  args: string[];
  timeoutSeconds: number;
}

export interface Config {
  watchDirectory: string;
  targetExtension: string;
  settleDelaySeconds: number;
  downloadTimeoutSeconds: number;
  stabilizationCeilingSeconds: number;
  fallbackLookbackMinutes: number;
  pollIntervalMs: number;
  converter: ConverterConfig;
  logLevel: LogLevel;
}
