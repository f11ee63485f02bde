import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import NodeID3 from 'node-id3';
import type { ClassifiedError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import type { Config, ProgressSink, RemoteTrigger, Result } from '../src/types.js';

// MPEG-1 Layer III, 128 kbps, 44.1 kHz, no padding
const FRAME_HEADER = [0xff, 0xfb, 0x90, 0x00];
export const FRAME_LENGTH = 417;

export const silentLogger = createLogger('test', 'silent');

export function createMp3Buffer(frameCount = 24): Buffer {
  const buffer = Buffer.alloc(FRAME_LENGTH * frameCount);

  for (let frame = 0; frame < frameCount; frame++) {
    buffer.set(FRAME_HEADER, frame * FRAME_LENGTH);
  }

  return buffer;
}

export function createTaggedMp3(tags: NodeID3.Tags, frameCount = 24): Buffer {
  return NodeID3.write(tags, createMp3Buffer(frameCount));
}

export async function writeMp3(path: string, tags?: NodeID3.Tags): Promise<void> {
  await writeFile(path, tags ? createTaggedMp3(tags) : createMp3Buffer());
}

export interface TestFrame {
  id: string;
  data: Buffer;
  flags?: [number, number];
}

function syncsafeBytes(value: number): number[] {
  return [(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f];
}

/** Builds an ID3v2 tag frame by frame, including identifiers node-id3 does not know. */
export function createId3Tag(version: 3 | 4, frames: TestFrame[], padding = 0): Buffer {
  const encoded = frames.map(({ id, data, flags = [0, 0] }) => {
    const header = Buffer.alloc(10);
    header.write(id, 0, 'latin1');

    if (version === 4) {
      header.set(syncsafeBytes(data.length), 4);
    } else {
      header.writeUInt32BE(data.length, 4);
    }

    header.set(flags, 8);
    return Buffer.concat([header, data]);
  });

  const body = Buffer.concat([...encoded, Buffer.alloc(padding)]);
  return Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([version, 0, 0, ...syncsafeBytes(body.length)]), body]);
}

export function textFrame(id: string, text: string): TestFrame {
  return { id, data: Buffer.concat([Buffer.from([0]), Buffer.from(text, 'latin1')]) };
}

export function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'download-tagger-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function testConfig(watchDirectory: string, overrides: Partial<Config> = {}): Config {
  return {
    watchDirectory,
    targetExtension: '.mp3',
    settleDelaySeconds: 0,
    downloadTimeoutSeconds: 2,
    stabilizationCeilingSeconds: 2,
    fallbackLookbackMinutes: 10,
    pollIntervalMs: 50,
    converter: { command: 'converter', args: ['{url}'], timeoutSeconds: 5 },
    logLevel: 'silent',
    ...overrides,
  };
}

export class RecordingProgress implements ProgressSink {
  readonly reports: Array<{ message: string; percent: number }> = [];
  readonly failures: ClassifiedError[] = [];

  report(message: string, percent: number): void {
    this.reports.push({ message, percent });
  }

  fail(error: ClassifiedError): void {
    this.failures.push(error);
  }

  get percents(): number[] {
    return this.reports.map((entry) => entry.percent);
  }
}

type Conversion = (sourceUrl: string, signal?: AbortSignal) => Promise<Result<void>>;

const succeed = (): Promise<Result<void>> => Promise.resolve({ ok: true, value: undefined });

export class FakeTrigger implements RemoteTrigger {
  readonly conversions: string[] = [];
  opened = 0;
  closed = 0;
  private readonly onOpen: () => Promise<Result<void>>;
  private readonly onConvert: Conversion;

  constructor(onConvert: Conversion = succeed, onOpen: () => Promise<Result<void>> = succeed) {
    this.onConvert = onConvert;
    this.onOpen = onOpen;
  }

  open(): Promise<Result<void>> {
    this.opened++;
    return this.onOpen();
  }

  performRemoteConversion(sourceUrl: string, signal?: AbortSignal): Promise<Result<void>> {
    this.conversions.push(sourceUrl);
    return this.onConvert(sourceUrl, signal);
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

/** Resolves once `signal` aborts. */
export function untilAborted(signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }

    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
