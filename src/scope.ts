import { errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';

type Release = () => void | Promise<void>;

interface Entry {
  name: string;
  release: Release;
}

/**
 * Resources held by one workflow run. Each release runs exactly once, in
 * reverse order of registration, and close() is safe to call concurrently.
 * A release deferred after close() runs straight away.
 */
export class ResourceScope {
  private readonly entries: Entry[] = [];
  private readonly logger: Logger;
  private closing: Promise<boolean> | null = null;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('scope');
  }

  async defer(name: string, release: Release): Promise<void> {
    if (this.closing) {
      await this.runRelease({ name, release });
      return;
    }

    this.entries.push({ name, release });
  }

  /** Resolves `true` when every release succeeded. */
  close(): Promise<boolean> {
    if (!this.closing) {
      this.closing = this.releaseAll();
    }

    return this.closing;
  }

  private async releaseAll(): Promise<boolean> {
    let clean = true;

    while (this.entries.length > 0) {
      const entry = this.entries.pop();

      if (entry && !(await this.runRelease(entry))) {
        clean = false;
      }
    }

    return clean;
  }

  private async runRelease(entry: Entry): Promise<boolean> {
    try {
      await entry.release();
      this.logger.debug(`Released ${entry.name}`);
      return true;
    } catch (error) {
      this.logger.warn(`Error releasing ${entry.name}: ${errorMessage(error)}`);
      return false;
    }
  }
}
