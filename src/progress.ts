import chalk from 'chalk';
import cliProgress from 'cli-progress';
import ora, { type Ora } from 'ora';
import type { ClassifiedError } from './errors.js';
import type { ProgressSink } from './types.js';

/**
 * Clamps reports to 0-100 and drops any that would move the bar backwards.
 * One instance per workflow run.
 */
export class MonotonicProgress implements ProgressSink {
  private readonly sink: ProgressSink;
  private percent = -1;
  private failed = false;

  constructor(sink: ProgressSink) {
    this.sink = sink;
  }

  get current(): number {
    return Math.max(this.percent, 0);
  }

  report(message: string, percent: number): void {
    const clamped = Math.min(100, Math.max(0, Math.round(percent)));

    if (this.failed || clamped < this.percent) {
      return;
    }

    this.percent = clamped;
    this.sink.report(message, clamped);
  }

  fail(error: ClassifiedError): void {
    if (this.failed) {
      return;
    }

    this.failed = true;
    this.sink.fail(error);
  }
}

export const silentProgress: ProgressSink = {
  report() {},
  fail() {},
};

export function createProgressBar(): ProgressSink {
  const bar = new cliProgress.SingleBar({
    format: 'Download |{bar}| {percentage}% | {stage}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
  });

  let started = false;

  return {
    report(message, percent) {
      if (!started) {
        bar.start(100, percent, { stage: message });
        started = true;
      } else {
        bar.update(percent, { stage: message });
      }

      if (percent >= 100) {
        bar.stop();
      }
    },
    fail(error) {
      if (started) {
        bar.stop();
      }

      console.log(chalk.red(`✗ ${error.userMessage}`));
    },
  };
}

export function createSpinnerProgress(): ProgressSink {
  let spinner: Ora | null = null;

  return {
    report(message, percent) {
      const text = `${message} ${chalk.gray(`(${percent}%)`)}`;

      if (!spinner) {
        spinner = ora(text).start();
      } else {
        spinner.text = text;
      }

      if (percent >= 100) {
        spinner.succeed(message);
      }
    },
    fail(error) {
      if (spinner) {
        spinner.fail(error.userMessage);
      } else {
        console.log(chalk.red(`✗ ${error.userMessage}`));
      }
    },
  };
}
