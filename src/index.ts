#!/usr/bin/env node
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from './config.js';
import { CompletionDetector } from './detector.js';
import { ClassifiedError, MAX_RETRY_ATTEMPTS, shouldRetry } from './errors.js';
import { createLogger } from './logger.js';
import { probeAudio, summarizeTags } from './metadata.js';
import { createProgressBar, createSpinnerProgress } from './progress.js';
import { printTags, promptConfirmTagging, promptForDownload, promptForFields, promptRetry } from './prompts.js';
import { CommandRemoteTrigger } from './remote-trigger.js';
import { TagMutationEngine } from './tag-engine.js';
import type { Config, WorkflowReport } from './types.js';
import { WorkflowOrchestrator } from './workflow.js';

function printError(error: ClassifiedError): void {
  console.log(chalk[error.critical ? 'bgRed' : 'red'](`\n✗ ${error.userMessage}`));

  if (error.backupPath) {
    console.log(chalk.yellow(`  Backup kept at: ${error.backupPath}`));
  }

  for (const action of error.suggestedActions) {
    console.log(chalk.gray(`  • ${action}`));
  }
}

function printReport(report: WorkflowReport): void {
  if (report.state === 'succeeded') {
    console.log(chalk.green(`\n✓ Tagged ${report.filePath ?? ''}`));
    return;
  }

  if (report.error) {
    printError(report.error);
  }
}

function createEngine(config: Config): TagMutationEngine {
  return new TagMutationEngine({
    extension: config.targetExtension,
    logger: createLogger('tag-engine', config.logLevel),
  });
}

function requireFileArgument(command: string): string | null {
  const file = process.argv[3];

  if (!file) {
    console.log(chalk.red(`Usage: download-tagger ${command} <file>`));
    process.exitCode = 1;
    return null;
  }

  return resolve(file);
}

async function runDownload(): Promise<void> {
  console.log(chalk.cyan('\n🎵 Download Tagger\n'));

  const config = await loadConfig();
  const detector = new CompletionDetector({
    pollIntervalMs: config.pollIntervalMs,
    stabilizationCeilingMs: config.stabilizationCeilingSeconds * 1000,
    logger: createLogger('detector', config.logLevel),
  });
  const trigger = new CommandRemoteTrigger(config.converter, {
    cwd: config.watchDirectory,
    settleDelayMs: config.settleDelaySeconds * 1000,
    logger: createLogger('converter', config.logLevel),
  });
  const workflow = new WorkflowOrchestrator({
    trigger,
    detector,
    engine: createEngine(config),
    config,
    progress: process.stdout.isTTY ? createProgressBar() : createSpinnerProgress(),
    logger: createLogger('workflow', config.logLevel),
  });

  const request = await promptForDownload();

  if (!request) {
    console.log(chalk.gray('Cancelled.'));
    return;
  }

  const onInterrupt = (): void => {
    console.log(chalk.yellow('\nCancelling...'));
    workflow.cancel().catch((error: unknown) => {
      console.error(chalk.red('Cleanup failed:'), error);
    });
  };

  process.on('SIGINT', onInterrupt);

  try {
    let run = workflow.submit(request);

    while (run.ok) {
      const report = await run.value.completion;
      printReport(report);

      if (report.state === 'succeeded') {
        return;
      }

      process.exitCode = 1;

      if (!report.error || !shouldRetry(report.error, report.attempt)) {
        return;
      }

      if (!(await promptRetry(report.error.userMessage, report.attempt, MAX_RETRY_ATTEMPTS))) {
        return;
      }

      process.exitCode = 0;
      run = workflow.retry();
    }

    printError(run.error);
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onInterrupt);
    await workflow.shutdown();
  }
}

async function runTag(): Promise<void> {
  const filePath = requireFileArgument('tag');

  if (!filePath) {
    return;
  }

  const config = await loadConfig();
  const engine = createEngine(config);
  const current = await engine.readFields(filePath);

  if (!current.ok) {
    printError(current.error);
    process.exitCode = 1;
    return;
  }

  const fields = await promptForFields(summarizeTags(current.value));

  if (!(await promptConfirmTagging(filePath, fields))) {
    console.log(chalk.gray('Skipped.'));
    return;
  }

  const spinner = ora('Writing metadata to file...').start();
  const applied = await engine.applyFields(filePath, fields);

  if (!applied.ok) {
    spinner.fail('Metadata was not written');
    printError(applied.error);
    process.exitCode = 1;
    return;
  }

  spinner.succeed(`Tagged ${filePath}`);
}

async function runRead(): Promise<void> {
  const filePath = requireFileArgument('read');

  if (!filePath) {
    return;
  }

  const config = await loadConfig();
  const tags = await createEngine(config).readFields(filePath);

  if (!tags.ok) {
    printError(tags.error);
    process.exitCode = 1;
    return;
  }

  printTags(await probeAudio(filePath), tags.value);
}

async function runWatch(): Promise<void> {
  const config = await loadConfig();
  const detector = new CompletionDetector({
    pollIntervalMs: config.pollIntervalMs,
    stabilizationCeilingMs: config.stabilizationCeilingSeconds * 1000,
    logger: createLogger('detector', config.logLevel),
  });

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.on('SIGINT', onInterrupt);

  const started = await detector.startWatching(
    { directory: config.watchDirectory, extension: config.targetExtension },
    { signal: controller.signal }
  );

  if (!started.ok) {
    process.off('SIGINT', onInterrupt);
    printError(started.error);
    process.exitCode = 1;
    return;
  }

  const spinner = ora(`Watching ${config.watchDirectory} (Ctrl+C to stop)`).start();
  let completed = 0;

  try {
    while (!controller.signal.aborted) {
      const outcome = await detector.awaitNewFile(config.downloadTimeoutSeconds * 1000, controller.signal);

      if (outcome.status === 'stable') {
        completed++;
        spinner.stopAndPersist({ symbol: chalk.green('✓'), text: outcome.path });
        spinner.start(`Watching ${config.watchDirectory} (${completed} completed)`);
      } else if (outcome.status === 'failed') {
        spinner.warn(outcome.error.message);
        spinner.start();
      }
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    detector.stopWatching();
    spinner.succeed(`Stopped watching. ${completed} completed downloads.`);
  }
}

function printUsage(): void {
  console.log(`Usage: download-tagger [command]

Commands:
  download       Convert a URL, wait for the file and tag it (default)
  tag <file>     Write artist/title/album/track to an existing file
  read <file>    Show the ID3 frames of a file
  watch          Report completed downloads in the watch directory`);
}

function handleFatal(error: unknown): void {
  if (error instanceof ClassifiedError) {
    printError(error);
  } else {
    console.error(error);
  }

  process.exitCode = 1;
}

const command = process.argv[2];

switch (command) {
  case undefined:
  case 'download':
    runDownload().catch(handleFatal);
    break;

  case 'tag':
    runTag().catch(handleFatal);
    break;

  case 'read':
    runRead().catch(handleFatal);
    break;

  case 'watch':
    runWatch().catch(handleFatal);
    break;

  default:
    printUsage();
    process.exitCode = command === 'help' || command === '--help' ? 0 : 1;
}
