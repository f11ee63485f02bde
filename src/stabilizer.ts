import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { sleep } from './abort.js';
import { ClassifiedError, errorCode, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { hasAudioSignature, readHeader } from './signature.js';

export const REQUIRED_STABLE_POLLS = 3;

// Locked or briefly unavailable; worth polling again.
const TRANSIENT_CODES = new Set(['EBUSY', 'EACCES', 'EPERM', 'EAGAIN', 'EMFILE', 'ENFILE']);

export interface StabilizeOptions {
  pollIntervalMs: number;
  maxPolls: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export type StabilizeOutcome =
  | { status: 'stable'; size: number; polls: number }
  | { status: 'failed'; error: ClassifiedError }
  | { status: 'aborted' };

export function pollsForCeiling(ceilingMs: number, pollIntervalMs: number): number {
  return Math.max(REQUIRED_STABLE_POLLS + 1, Math.ceil(ceilingMs / pollIntervalMs));
}

function fileAccessFailure(filePath: string, message: string, cause: unknown): StabilizeOutcome {
  return {
    status: 'failed',
    error: new ClassifiedError('file-system-access', message, 'awaiting-file', { cause, filePath }),
  };
}

/**
 * Polls `filePath` until its size is unchanged (and non-zero) for three
 * consecutive polls and it starts with an ID3 tag or MPEG frame sync.
 * A header mismatch resets the count; the file may still be growing.
 */
export async function waitForStable(filePath: string, options: StabilizeOptions): Promise<StabilizeOutcome> {
  const { pollIntervalMs, maxPolls, signal } = options;
  const logger = options.logger ?? createLogger('stabilizer');
  const name = basename(filePath);

  let lastSize = -1;
  let stableCount = 0;

  for (let attempt = 0; attempt < maxPolls; attempt++) {
    if (signal?.aborted) {
      return { status: 'aborted' };
    }

    const isLastAttempt = attempt === maxPolls - 1;

    try {
      const { size } = await stat(filePath);

      if (size === lastSize && size > 0) {
        stableCount++;

        if (stableCount >= REQUIRED_STABLE_POLLS) {
          const header = await readHeader(filePath);

          if (hasAudioSignature(header)) {
            logger.debug(`${name} stable at ${size} bytes after ${attempt + 1} polls`);
            return { status: 'stable', size, polls: attempt + 1 };
          }

          logger.debug(`${name} has no audio header yet, continuing to poll`);
          stableCount = 0;
        }
      } else {
        stableCount = 0;
        lastSize = size;
      }
    } catch (error) {
      const code = errorCode(error);

      if (code === 'ENOENT') {
        return fileAccessFailure(filePath, `${name} was moved or deleted while downloading`, error);
      }

      if (code === null || !TRANSIENT_CODES.has(code)) {
        return fileAccessFailure(filePath, `Could not inspect ${name}: ${errorMessage(error)}`, error);
      }

      if (isLastAttempt) {
        return fileAccessFailure(
          filePath,
          `File access error after ${maxPolls} attempts: ${errorMessage(error)}`,
          error
        );
      }

      logger.debug(`${name} temporarily unavailable (${code}), retrying`);
    }

    if (!isLastAttempt && !(await sleep(pollIntervalMs, signal))) {
      return { status: 'aborted' };
    }
  }

  return {
    status: 'failed',
    error: new ClassifiedError(
      'download-timeout',
      `${name} did not stabilize within ${Math.round((maxPolls * pollIntervalMs) / 1000)} seconds`,
      'awaiting-file',
      { filePath }
    ),
  };
}
