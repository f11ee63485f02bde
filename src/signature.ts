import { open } from 'node:fs/promises';

export const HEADER_PROBE_BYTES = 10;

export function hasAudioSignature(header: Uint8Array): boolean {
  // "ID3" container tag
  if (header.length >= 3 && header[0] === 0x49 && header[1] === 0x44 && header[2] === 0x33) {
    return true;
  }

  // MPEG frame sync: 11 set bits
  return header.length >= 2 && header[0] === 0xff && (header[1] & 0xe0) === 0xe0;
}

export async function readHeader(filePath: string, length: number = HEADER_PROBE_BYTES): Promise<Buffer> {
  const handle = await open(filePath, 'r');

  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}
