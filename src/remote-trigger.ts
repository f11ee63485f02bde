import { spawn, type ChildProcess } from 'node:child_process';
import { sleep } from './abort.js';
import { ClassifiedError, errorCode, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { ConverterConfig, RemoteTrigger, Result } from './types.js';

const NETWORK_FAILURE = /(getaddrinfo|ENOTFOUND|ECONNREFUSED|ECONNRESET|ETIMEDOUT|network|connection|timed out|unable to download webpage)/i;
const VERSION_CHECK_TIMEOUT_MS = 15_000;
const STDERR_TAIL_LENGTH = 400;

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onSpawn?: (child: ChildProcess) => void;
}

/**
 * Runs `command` to completion. Rejects only when the process cannot be
 * spawned at all; timeouts and aborts resolve with the matching flag set.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;

    options.onSpawn?.(proc);

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      proc.kill();
    }, options.timeoutMs);

    const onAbort = (): void => {
      aborted = true;
      proc.kill();
    };

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const cleanup = (): void => {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
    };

    proc.on('close', (code) => {
      cleanup();
      resolve({ code, stdout, stderr, timedOut, aborted });
    });

    proc.on('error', (err) => {
      cleanup();
      reject(err);
    });
  });
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL_LENGTH ? `...${trimmed.slice(-STDERR_TAIL_LENGTH)}` : trimmed;
}

export function classifyConverterFailure(result: CommandResult, timeoutSeconds: number): ClassifiedError {
  if (result.aborted) {
    return new ClassifiedError('workflow-cancelled', 'Remote conversion was cancelled', 'triggering');
  }

  if (result.timedOut) {
    return new ClassifiedError(
      'remote-unreachable',
      `Converter did not finish within ${timeoutSeconds} seconds`,
      'triggering'
    );
  }

  const detail = tail(result.stderr) || `exit code ${result.code}`;

  if (NETWORK_FAILURE.test(result.stderr)) {
    return new ClassifiedError('remote-unreachable', `Could not reach the conversion source: ${detail}`, 'triggering');
  }

  return new ClassifiedError('remote-element-missing', `Converter rejected the request: ${detail}`, 'triggering');
}

export interface CommandTriggerOptions {
  cwd: string;
  settleDelayMs: number;
  logger?: Logger;
}

/**
 * Drives an external converter (yt-dlp by default) that writes its output
 * into the watched directory.
 */
export class CommandRemoteTrigger implements RemoteTrigger {
  private readonly settings: ConverterConfig;
  private readonly cwd: string;
  private readonly settleDelayMs: number;
  private readonly logger: Logger;
  private opened = false;
  private child: ChildProcess | null = null;

  constructor(settings: ConverterConfig, options: CommandTriggerOptions) {
    this.settings = settings;
    this.cwd = options.cwd;
    this.settleDelayMs = options.settleDelayMs;
    this.logger = options.logger ?? createLogger('converter');
  }

  async open(): Promise<Result<void>> {
    if (this.opened) {
      return { ok: true, value: undefined };
    }

    try {
      const result = await runCommand(this.settings.command, ['--version'], {
        timeoutMs: VERSION_CHECK_TIMEOUT_MS,
        onSpawn: (child) => this.track(child),
      });

      if (result.code !== 0) {
        return {
          ok: false,
          error: new ClassifiedError(
            'remote-automation-unavailable',
            `${this.settings.command} --version failed: ${tail(result.stderr) || `exit code ${result.code}`}`,
            'triggering'
          ),
        };
      }

      this.logger.debug(`${this.settings.command} ${result.stdout.trim().split('\n')[0] ?? ''}`);
    } catch (error) {
      const message = errorCode(error) === 'ENOENT'
        ? `${this.settings.command} is not installed or not on PATH`
        : `Could not start ${this.settings.command}: ${errorMessage(error)}`;

      return {
        ok: false,
        error: new ClassifiedError('remote-automation-unavailable', message, 'triggering', { cause: error }),
      };
    }

    this.opened = true;
    return { ok: true, value: undefined };
  }

  async performRemoteConversion(sourceUrl: string, signal?: AbortSignal): Promise<Result<void>> {
    const ready = await this.open();

    if (!ready.ok) {
      return ready;
    }

    const args = this.settings.args.map((arg) => arg.split('{url}').join(sourceUrl));
    this.logger.info(`Converting ${sourceUrl}`);

    let result: CommandResult;

    try {
      result = await runCommand(this.settings.command, args, {
        cwd: this.cwd,
        timeoutMs: this.settings.timeoutSeconds * 1000,
        signal,
        onSpawn: (child) => this.track(child),
      });
    } catch (error) {
      return {
        ok: false,
        error: new ClassifiedError(
          'remote-automation-unavailable',
          `Could not start ${this.settings.command}: ${errorMessage(error)}`,
          'triggering',
          { cause: error }
        ),
      };
    }

    if (result.code !== 0 || result.timedOut || result.aborted) {
      return { ok: false, error: classifyConverterFailure(result, this.settings.timeoutSeconds) };
    }

    // Let the converter's final rename reach the watcher.
    if (!(await sleep(this.settleDelayMs, signal))) {
      return {
        ok: false,
        error: new ClassifiedError('workflow-cancelled', 'Remote conversion was cancelled', 'triggering'),
      };
    }

    return { ok: true, value: undefined };
  }

  async close(): Promise<void> {
    if (this.child && this.child.exitCode === null && this.child.signalCode === null) {
      this.logger.debug(`Stopping ${this.settings.command} (pid ${this.child.pid ?? 'unknown'})`);
      this.child.kill();
    }

    this.child = null;
    this.opened = false;
  }

  private track(child: ChildProcess): void {
    this.child = child;

    child.once('close', () => {
      if (this.child === child) {
        this.child = null;
      }
    });
  }
}
