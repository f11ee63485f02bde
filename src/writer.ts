import { readFile, writeFile } from 'node:fs/promises';
import NodeID3 from 'node-id3';
import { describeFrame, encodeId3v23Tag, parseId3Tag, type Id3Frame } from './id3-frames.js';
import type { MetadataFields, TagMap } from './types.js';

export interface TagWriter {
  write(filePath: string, fields: MetadataFields): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenFrame(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Buffer.isBuffer(value)) {
    return `(${value.length} bytes)`;
  }

  if (Array.isArray(value)) {
    const parts = value
      .map(flattenFrame)
      .filter((part): part is string => part !== null);

    return parts.length > 0 ? parts.join('; ') : null;
  }

  if (!isRecord(value)) {
    return null;
  }

  const { text, value: userValue, url, imageBuffer, mime } = value;

  if (typeof text === 'string') {
    return text;
  }

  if (typeof userValue === 'string') {
    return userValue;
  }

  if (typeof url === 'string') {
    return url;
  }

  if (Buffer.isBuffer(imageBuffer)) {
    return `${typeof mime === 'string' ? mime : 'image'} (${imageBuffer.length} bytes)`;
  }

  return JSON.stringify(value);
}

export interface Id3Inventory {
  tags: TagMap;
  /** Frames node-id3 does not parse and would drop on update. */
  unrecognised: Id3Frame[];
}

function inventoryOf(buffer: Buffer): Id3Inventory {
  const tags: unknown = NodeID3.read(buffer);
  const frames: TagMap = {};
  const known = new Set<string>();

  if (isRecord(tags) && isRecord(tags.raw)) {
    for (const [frameId, value] of Object.entries(tags.raw)) {
      known.add(frameId);
      const flattened = flattenFrame(value);

      if (flattened !== null) {
        frames[frameId] = flattened;
      }
    }
  }

  const unrecognised = (parseId3Tag(buffer)?.frames ?? []).filter((frame) => !known.has(frame.id));

  for (const frame of unrecognised) {
    const described = describeFrame(frame);
    frames[frame.id] = frame.id in frames ? `${frames[frame.id]}; ${described}` : described;
  }

  return { tags: frames, unrecognised };
}

export async function readId3Inventory(filePath: string): Promise<Id3Inventory> {
  return inventoryOf(await readFile(filePath));
}

export async function readId3Frames(filePath: string): Promise<TagMap> {
  return (await readId3Inventory(filePath)).tags;
}

// node-id3 rewrites only the frames it knows; put the rest back after it.
async function restoreFrames(filePath: string, frames: Id3Frame[]): Promise<void> {
  const updated = await readFile(filePath);
  const tag = parseId3Tag(updated);

  if (!tag) {
    throw new Error(`No ID3v2 tag found in ${filePath} after writing`);
  }

  const present = new Set(tag.frames.map((frame) => frame.id));
  const missing = frames.filter((frame) => !present.has(frame.id));

  if (missing.length === 0) {
    return;
  }

  const rebuilt = encodeId3v23Tag([...tag.frames, ...missing]);
  await writeFile(filePath, Buffer.concat([rebuilt, updated.subarray(tag.length)]));
}

async function writeMp3Tags(filePath: string, fields: MetadataFields): Promise<void> {
  const { unrecognised } = await readId3Inventory(filePath);
  const tags: NodeID3.Tags = {
    artist: fields.artist,
    title: fields.title,
    album: fields.album,
    trackNumber: String(fields.trackNumber),
  };

  // update() merges with the frames already in the file
  const result = NodeID3.update(tags, filePath);

  if (result instanceof Error) {
    throw new Error(`Failed to write MP3 tags: ${result.message}`);
  }

  if (unrecognised.length > 0) {
    await restoreFrames(filePath, unrecognised);
  }
}

export const id3TagWriter: TagWriter = {
  write: writeMp3Tags,
};
