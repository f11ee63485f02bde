import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { parseFile } from 'music-metadata';
import type { MetadataFields, TagMap } from './types.js';

export interface AudioProbe {
  path: string;
  filename: string;
  size: number;
  duration: number | null;
  bitrate: number | null;
  sampleRate: number | null;
  format: string;
}

export interface TagSummary {
  artist: string | null;
  title: string | null;
  album: string | null;
  trackNumber: string | null;
}

export const FIELD_FRAMES: Record<keyof MetadataFields, string> = {
  artist: 'TPE1',
  title: 'TIT2',
  album: 'TALB',
  trackNumber: 'TRCK',
};

export const TARGETED_FRAMES: ReadonlySet<string> = new Set(Object.values(FIELD_FRAMES));

export function fieldsToFrames(fields: MetadataFields): TagMap {
  return {
    [FIELD_FRAMES.artist]: fields.artist,
    [FIELD_FRAMES.title]: fields.title,
    [FIELD_FRAMES.album]: fields.album,
    [FIELD_FRAMES.trackNumber]: String(fields.trackNumber),
  };
}

export function validateMetadataFields(fields: MetadataFields): string[] {
  const errors: string[] = [];

  if (fields.artist.trim() === '') {
    errors.push('Artist cannot be empty.');
  }

  if (fields.title.trim() === '') {
    errors.push('Title cannot be empty.');
  }

  if (fields.album.trim() === '') {
    errors.push('Album cannot be empty.');
  }

  if (!Number.isInteger(fields.trackNumber) || fields.trackNumber <= 0) {
    errors.push('Track number must be a positive integer.');
  }

  return errors;
}

export function summarizeTags(tags: TagMap): TagSummary {
  return {
    artist: tags[FIELD_FRAMES.artist] ?? null,
    title: tags[FIELD_FRAMES.title] ?? null,
    album: tags[FIELD_FRAMES.album] ?? null,
    trackNumber: tags[FIELD_FRAMES.trackNumber] ?? null,
  };
}

export async function probeAudio(filePath: string): Promise<AudioProbe | null> {
  try {
    const [fileStats, metadata] = await Promise.all([
      stat(filePath),
      parseFile(filePath, { duration: true }),
    ]);

    return {
      path: filePath,
      filename: basename(filePath),
      size: fileStats.size,
      duration: metadata.format.duration ?? null,
      bitrate: metadata.format.bitrate ? Math.round(metadata.format.bitrate / 1000) : null,
      sampleRate: metadata.format.sampleRate ?? null,
      format: extname(filePath).slice(1).toLowerCase(),
    };
  } catch {
    return null;
  }
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}
