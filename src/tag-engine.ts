import { constants } from 'node:fs';
import { copyFile, rename, stat, statfs, unlink } from 'node:fs/promises';
import { basename, dirname, extname } from 'node:path';
import { parseFile } from 'music-metadata';
import { ClassifiedError, errorCode, errorMessage, toClassifiedError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { fieldsToFrames, formatFileSize, TARGETED_FRAMES, validateMetadataFields } from './metadata.js';
import { hasAudioSignature, readHeader } from './signature.js';
import type { MetadataFields, MutationAttempt, MutationOutcome, Result, TagMap } from './types.js';
import { id3TagWriter, readId3Frames, type TagWriter } from './writer.js';

export const MIN_AUDIO_FILE_SIZE = 1024;
export const BACKUP_SUFFIX = '.backup';
const MAX_BACKUP_NAME_ATTEMPTS = 100;

export interface TagEngineOptions {
  extension?: string;
  minimumSize?: number;
  writer?: TagWriter;
  freeSpace?: (directory: string) => Promise<number>;
  now?: () => number;
  logger?: Logger;
}

async function volumeFreeSpace(directory: string): Promise<number> {
  const stats = await statfs(directory);
  return stats.bavail * stats.bsize;
}

function mutationError(message: string, filePath: string, cause?: unknown): ClassifiedError {
  return new ClassifiedError('mutation-failed', message, 'mutating', { cause, filePath });
}

function backupError(message: string, filePath: string, cause?: unknown): ClassifiedError {
  return new ClassifiedError('backup-failed', message, 'mutating', { cause, filePath });
}

/**
 * Rewrites artist/title/album/track frames of an MP3 file while keeping every
 * other frame. A verified backup exists before the first write and is moved
 * back over the target if anything after it fails.
 *
 * Callers must not run two mutations against the same path at once.
 */
export class TagMutationEngine {
  private readonly extension: string;
  private readonly minimumSize: number;
  private readonly writer: TagWriter;
  private readonly freeSpace: (directory: string) => Promise<number>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: TagEngineOptions = {}) {
    this.extension = (options.extension ?? '.mp3').toLowerCase();
    this.minimumSize = options.minimumSize ?? MIN_AUDIO_FILE_SIZE;
    this.writer = options.writer ?? id3TagWriter;
    this.freeSpace = options.freeSpace ?? volumeFreeSpace;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('tag-engine');
  }

  async validate(filePath: string): Promise<boolean> {
    const name = basename(filePath);

    if (extname(filePath).toLowerCase() !== this.extension) {
      this.logger.debug(`${name}: extension is not ${this.extension}`);
      return false;
    }

    try {
      const stats = await stat(filePath);

      if (!stats.isFile() || stats.size < this.minimumSize) {
        this.logger.debug(`${name}: not a file or smaller than ${this.minimumSize} bytes`);
        return false;
      }

      const metadata = await parseFile(filePath, { duration: true });
      const duration = metadata.format.duration ?? 0;

      if (!(duration > 0)) {
        this.logger.debug(`${name}: no playable audio (duration ${duration})`);
        return false;
      }

      return hasAudioSignature(await readHeader(filePath));
    } catch (error) {
      this.logger.debug(`${name}: validation failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async readFields(filePath: string): Promise<Result<TagMap>> {
    if (!(await this.validate(filePath))) {
      return { ok: false, error: this.invalidFileError(filePath) };
    }

    try {
      return { ok: true, value: await readId3Frames(filePath) };
    } catch (error) {
      return {
        ok: false,
        error: mutationError(`Error reading metadata from ${filePath}: ${errorMessage(error)}`, filePath, error),
      };
    }
  }

  async backupOriginal(filePath: string): Promise<Result<string>> {
    let size: number;

    try {
      size = (await stat(filePath)).size;
    } catch (error) {
      return {
        ok: false,
        error: backupError(`Cannot back up ${filePath}: ${errorMessage(error)}`, filePath, error),
      };
    }

    const space = await this.checkFreeSpace(filePath, size);

    if (!space.ok) {
      return space;
    }

    return this.createVerifiedBackup(filePath, size);
  }

  async applyFields(filePath: string, fields: MetadataFields): Promise<Result<MutationAttempt>> {
    const attempt: MutationAttempt = {
      targetPath: filePath,
      backupPath: null,
      originalSize: 0,
      outcome: 'unstarted',
    };

    if (!(await this.validate(filePath))) {
      return { ok: false, error: this.invalidFileError(filePath) };
    }

    const fieldErrors = validateMetadataFields(fields);

    if (fieldErrors.length > 0) {
      return {
        ok: false,
        error: new ClassifiedError('input-validation', `Invalid metadata: ${fieldErrors.join(' ')}`, 'mutating', {
          filePath,
        }),
      };
    }

    this.advance(attempt, 'validated');

    try {
      attempt.originalSize = (await stat(filePath)).size;
    } catch (error) {
      return {
        ok: false,
        error: new ClassifiedError('file-system-access', `Cannot read ${filePath}: ${errorMessage(error)}`, 'mutating', {
          cause: error,
          filePath,
        }),
      };
    }

    const space = await this.checkFreeSpace(filePath, attempt.originalSize);

    if (!space.ok) {
      return space;
    }

    const backup = await this.createVerifiedBackup(filePath, attempt.originalSize);

    if (!backup.ok) {
      return backup;
    }

    attempt.backupPath = backup.value;
    this.advance(attempt, 'backed-up');

    const failure = await this.writeAndVerify(filePath, fields, attempt);

    if (failure) {
      return { ok: false, error: await this.rollback(attempt, backup.value, failure) };
    }

    this.advance(attempt, 'verified');

    try {
      await unlink(backup.value);
    } catch (error) {
      this.logger.warn(`Tags written, but the backup ${backup.value} could not be removed: ${errorMessage(error)}`);
    }

    this.logger.info(`Metadata applied to ${basename(filePath)}`);
    return { ok: true, value: attempt };
  }

  private async writeAndVerify(
    filePath: string,
    fields: MetadataFields,
    attempt: MutationAttempt
  ): Promise<ClassifiedError | null> {
    try {
      const before = await readId3Frames(filePath);

      await this.writer.write(filePath, fields);
      this.advance(attempt, 'written');

      if (!(await this.validate(filePath))) {
        return mutationError('File became invalid after metadata application', filePath);
      }

      const after = await readId3Frames(filePath);
      const expected = fieldsToFrames(fields);

      for (const [frameId, value] of Object.entries(expected)) {
        if (after[frameId] !== value) {
          return mutationError(`${frameId} reads back as "${after[frameId] ?? ''}" instead of "${value}"`, filePath);
        }
      }

      for (const [frameId, value] of Object.entries(before)) {
        if (!TARGETED_FRAMES.has(frameId) && after[frameId] !== value) {
          return mutationError(`Existing ${frameId} frame was not preserved`, filePath);
        }
      }

      return null;
    } catch (error) {
      return toClassifiedError(error, 'mutation-failed', 'mutating');
    }
  }

  private async rollback(attempt: MutationAttempt, backupPath: string, failure: ClassifiedError): Promise<ClassifiedError> {
    try {
      await rename(backupPath, attempt.targetPath);
    } catch (restoreError) {
      this.advance(attempt, 'restore-failed');

      const error = new ClassifiedError(
        'restore-failed',
        `Failed to restore backup after metadata failure. Original error: ${failure.message}, ` +
          `restore error: ${errorMessage(restoreError)}. Backup kept at ${backupPath}`,
        'mutating',
        { cause: restoreError, filePath: attempt.targetPath, backupPath }
      );

      this.logger.error(error.message, restoreError);
      return error;
    }

    this.advance(attempt, 'rolled-back');
    this.logger.warn(`Restored ${basename(attempt.targetPath)} from backup: ${failure.message}`);

    if (failure.kind === 'mutation-failed' && failure.filePath === null) {
      return new ClassifiedError('mutation-failed', failure.message, 'mutating', {
        cause: failure.cause,
        filePath: attempt.targetPath,
      });
    }

    return failure;
  }

  private async checkFreeSpace(filePath: string, size: number): Promise<Result<void>> {
    let available: number;

    try {
      available = await this.freeSpace(dirname(filePath));
    } catch (error) {
      return {
        ok: false,
        error: backupError(`Could not determine free disk space: ${errorMessage(error)}`, filePath, error),
      };
    }

    if (available < size * 2) {
      return {
        ok: false,
        error: backupError(
          `Insufficient disk space to create backup. Need ${formatFileSize(size * 2)}, have ${formatFileSize(available)}.`,
          filePath
        ),
      };
    }

    return { ok: true, value: undefined };
  }

  private async createVerifiedBackup(filePath: string, size: number): Promise<Result<string>> {
    const stamp = this.now();

    for (let counter = 0; counter < MAX_BACKUP_NAME_ATTEMPTS; counter++) {
      const backupPath = `${filePath}${BACKUP_SUFFIX}.${stamp}${counter === 0 ? '' : `-${counter}`}`;

      try {
        await copyFile(filePath, backupPath, constants.COPYFILE_EXCL);
      } catch (error) {
        if (errorCode(error) === 'EEXIST') {
          continue;
        }

        return {
          ok: false,
          error: backupError(`Failed to create backup of ${filePath}: ${errorMessage(error)}`, filePath, error),
        };
      }

      const copied = await stat(backupPath).then((stats) => stats.size, () => -1);

      if (copied !== size) {
        await unlink(backupPath).catch((error: unknown) => {
          this.logger.warn(`Could not remove incomplete backup ${backupPath}: ${errorMessage(error)}`);
        });

        return { ok: false, error: backupError(`Backup verification failed for ${filePath}`, filePath) };
      }

      this.logger.debug(`Backed up ${basename(filePath)} to ${basename(backupPath)}`);
      return { ok: true, value: backupPath };
    }

    return {
      ok: false,
      error: backupError(`Could not find a free backup name for ${filePath}`, filePath),
    };
  }

  private invalidFileError(filePath: string): ClassifiedError {
    return new ClassifiedError('tag-validation-failed', `Invalid MP3 file: ${filePath}`, 'mutating', { filePath });
  }

  private advance(attempt: MutationAttempt, outcome: MutationOutcome): void {
    this.logger.debug(`${basename(attempt.targetPath)}: ${attempt.outcome} -> ${outcome}`);
    attempt.outcome = outcome;
  }
}
