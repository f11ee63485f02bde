export type ErrorKind =
  | 'input-validation'
  | 'remote-unreachable'
  | 'remote-element-missing'
  | 'remote-automation-unavailable'
  | 'download-timeout'
  | 'file-system-access'
  | 'tag-validation-failed'
  | 'backup-failed'
  | 'mutation-failed'
  | 'restore-failed'
  | 'workflow-already-running'
  | 'workflow-cancelled';

export type Stage = 'input' | 'triggering' | 'awaiting-file' | 'mutating' | 'workflow';

export const MAX_RETRY_ATTEMPTS = 3;

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'remote-unreachable',
  'remote-element-missing',
  'download-timeout',
]);

const KIND_LABELS: Record<ErrorKind, string> = {
  'input-validation': 'Input Error',
  'remote-unreachable': 'Network Error',
  'remote-element-missing': 'Converter Error',
  'remote-automation-unavailable': 'Converter Unavailable',
  'download-timeout': 'Download Timeout',
  'file-system-access': 'File System Error',
  'tag-validation-failed': 'Invalid Audio File',
  'backup-failed': 'Backup Error',
  'mutation-failed': 'Metadata Error',
  'restore-failed': 'CRITICAL: Restore Failed',
  'workflow-already-running': 'Busy',
  'workflow-cancelled': 'Cancelled',
};

const SUGGESTED_ACTIONS: Record<ErrorKind, string[]> = {
  'input-validation': [
    'Correct the input and try again',
    'Artist, title and album must not be empty; track number must be a positive integer',
  ],
  'remote-unreachable': [
    'Check your internet connection',
    'Try again in a few moments',
  ],
  'remote-element-missing': [
    'Try again in a few minutes',
    'The conversion service may have changed or rejected this URL',
  ],
  'remote-automation-unavailable': [
    'Check that the converter command is installed and on your PATH',
    'Review the "converter" section of config.json',
  ],
  'download-timeout': [
    'Check that you have sufficient disk space',
    'Make sure the converter saves into the watched directory',
    'Try the download again',
  ],
  'file-system-access': [
    'Check the permissions of the watched directory',
    'Make sure the file is not being moved or deleted by another program',
  ],
  'tag-validation-failed': [
    'Make sure the downloaded file is a complete MP3',
    'Try downloading the file again',
  ],
  'backup-failed': [
    'Free up disk space next to the file',
    'Check that the directory is writable',
  ],
  'mutation-failed': [
    'Check that the file is not open in another application',
    'The original file was restored; try again',
  ],
  'restore-failed': [
    'Do not delete the .backup file next to the target',
    'Copy the backup over the target manually to recover the original',
  ],
  'workflow-already-running': [
    'Wait for the current download to finish, or cancel it',
  ],
  'workflow-cancelled': [
    'Submit the request again when ready',
  ],
};

const STAGE_LABELS: Record<Stage, string> = {
  input: 'input validation',
  triggering: 'remote conversion',
  'awaiting-file': 'download detection',
  mutating: 'metadata update',
  workflow: 'workflow control',
};

interface ClassifiedErrorOptions {
  cause?: unknown;
  filePath?: string;
  backupPath?: string;
}

export class ClassifiedError extends Error {
  readonly kind: ErrorKind;
  readonly stage: Stage;
  readonly retryable: boolean;
  readonly filePath: string | null;
  readonly backupPath: string | null;

  constructor(kind: ErrorKind, message: string, stage: Stage, options: ClassifiedErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClassifiedError';
    this.kind = kind;
    this.stage = stage;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.filePath = options.filePath ?? null;
    this.backupPath = options.backupPath ?? null;
  }

  // Only a failed restore leaves the original file in an unknown state.
  get critical(): boolean {
    return this.kind === 'restore-failed';
  }

  get userMessage(): string {
    return `${KIND_LABELS[this.kind]} during ${STAGE_LABELS[this.stage]}: ${this.message}`;
  }

  get suggestedActions(): string[] {
    return SUGGESTED_ACTIONS[this.kind];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorCode(error: unknown): string | null {
  if (isErrnoException(error) && typeof error.code === 'string') {
    return error.code;
  }

  return null;
}

export function toClassifiedError(error: unknown, kind: ErrorKind, stage: Stage): ClassifiedError {
  if (error instanceof ClassifiedError) {
    return error;
  }

  return new ClassifiedError(kind, errorMessage(error), stage, { cause: error });
}

export function shouldRetry(
  error: ClassifiedError,
  attemptCount: number,
  maxAttempts: number = MAX_RETRY_ATTEMPTS
): boolean {
  return error.retryable && attemptCount < maxAttempts;
}
