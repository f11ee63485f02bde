import { ClassifiedError } from './errors.js';
import { validateMetadataFields } from './metadata.js';
import type { DownloadRequest, Result } from './types.js';

export function validateSourceUrl(value: string): string | null {
  const trimmed = value.trim();

  if (trimmed === '') {
    return 'Source URL cannot be empty.';
  }

  let url: URL;

  try {
    url = new URL(trimmed);
  } catch {
    return `Not a valid URL: ${trimmed}`;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'Source URL must start with http:// or https://';
  }

  if (url.hostname === '') {
    return 'Source URL must include a host.';
  }

  return null;
}

/** Accepts "7" and "7/12" (track/total), as ID3 TRCK does. */
export function parseTrackNumber(value: string): number | null {
  const match = /^\s*(\d+)(?:\s*\/\s*\d+)?\s*$/.exec(value);

  if (!match?.[1]) {
    return null;
  }

  const track = Number.parseInt(match[1], 10);
  return track > 0 ? track : null;
}

export function validateRequest(request: DownloadRequest): Result<DownloadRequest> {
  const problems: string[] = [];
  const urlProblem = validateSourceUrl(request.sourceUrl);

  if (urlProblem) {
    problems.push(urlProblem);
  }

  problems.push(...validateMetadataFields(request.fields));

  if (problems.length > 0) {
    return {
      ok: false,
      error: new ClassifiedError('input-validation', problems.join(' '), 'input'),
    };
  }

  return {
    ok: true,
    value: {
      sourceUrl: request.sourceUrl.trim(),
      fields: {
        artist: request.fields.artist.trim(),
        title: request.fields.title.trim(),
        album: request.fields.album.trim(),
        trackNumber: request.fields.trackNumber,
      },
    },
  };
}
