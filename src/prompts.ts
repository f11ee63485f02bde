import { input, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import { formatDuration, formatFileSize, type AudioProbe, type TagSummary } from './metadata.js';
import { parseTrackNumber, validateSourceUrl } from './request.js';
import type { DownloadRequest, MetadataFields, TagMap } from './types.js';

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) {
    return str;
  }
  return str.slice(0, maxLen - 3) + '...';
}

function required(field: string) {
  return (value: string): string | true => (value.trim() === '' ? `${field} cannot be empty.` : true);
}

async function promptForField(field: string, existingValue: string | null): Promise<string> {
  const value = await input({
    message: `${field}:`,
    default: existingValue ?? undefined,
    validate: required(field),
  });

  return value.trim();
}

async function promptForTrackNumber(existingValue: string | null): Promise<number> {
  const value = await input({
    message: 'Track number:',
    default: existingValue ?? '1',
    validate: (raw) => (parseTrackNumber(raw) === null ? 'Track number must be a positive integer.' : true),
  });

  return parseTrackNumber(value) ?? 1;
}

export async function promptForFields(existing: Partial<TagSummary> = {}): Promise<MetadataFields> {
  const artist = await promptForField('Artist', existing.artist ?? null);
  const title = await promptForField('Title', existing.title ?? null);
  const album = await promptForField('Album', existing.album ?? null);
  const trackNumber = await promptForTrackNumber(existing.trackNumber ?? null);

  return { artist, title, album, trackNumber };
}

export function printFields(fields: MetadataFields): void {
  console.log('\n📋 Summary:');
  console.log(`   Artist: ${fields.artist}`);
  console.log(`   Title:  ${fields.title}`);
  console.log(`   Album:  ${fields.album}`);
  console.log(`   Track:  ${fields.trackNumber}`);
}

export async function promptForDownload(): Promise<DownloadRequest | null> {
  const sourceUrl = await input({
    message: 'Source URL:',
    validate: (value) => validateSourceUrl(value) ?? true,
  });

  const fields = await promptForFields();
  printFields(fields);

  const confirmed = await confirm({
    message: 'Download and tag this file?',
    default: true,
  });

  return confirmed ? { sourceUrl: sourceUrl.trim(), fields } : null;
}

export async function promptConfirmTagging(filename: string, fields: MetadataFields): Promise<boolean> {
  console.log(`\n📁 ${truncate(filename, 58)}`);
  printFields(fields);

  return confirm({
    message: 'Write these tags?',
    default: true,
  });
}

export async function promptRetry(kind: string, attempt: number, maxAttempts: number): Promise<boolean> {
  return confirm({
    message: `${kind} (attempt ${attempt}/${maxAttempts}). Try again?`,
    default: true,
  });
}

export function printTags(probe: AudioProbe | null, tags: TagMap): void {
  console.log('─'.repeat(60));

  if (probe) {
    console.log(`📁 ${truncate(probe.filename, 58)}`);
    console.log(
      chalk.gray(
        `   ${formatFileSize(probe.size)} | ${formatDuration(probe.duration)} | ` +
          `${probe.bitrate ?? '?'} kbps | ${probe.sampleRate ?? '?'} Hz`
      )
    );
  }

  console.log('─'.repeat(60));

  const frameIds = Object.keys(tags).sort();

  if (frameIds.length === 0) {
    console.log(chalk.gray('   (no ID3 frames)'));
    return;
  }

  for (const frameId of frameIds) {
    console.log(`   ${chalk.cyan(frameId.padEnd(5))} ${truncate(tags[frameId] ?? '', 70)}`);
  }
}
