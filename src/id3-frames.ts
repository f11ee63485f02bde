export type Id3Version = 3 | 4;

export interface Id3Frame {
  id: string;
  version: Id3Version;
  /** Status and format flag bytes as stored in the frame header. */
  flags: Buffer;
  data: Buffer;
}

export interface Id3Tag {
  version: Id3Version;
  frames: Id3Frame[];
  /** Bytes the tag occupies at the start of the file, padding and footer included. */
  length: number;
}

const HEADER_LENGTH = 10;
const FRAME_ID = /^[A-Z0-9]{4}$/;

// v2.4 format flags: grouping, compression, encryption, unsynchronisation, data length
const V24_FORMAT_FLAGS = 0x4f;

function readSyncsafe(buffer: Buffer, offset: number): number {
  return (
    ((buffer.readUInt8(offset) & 0x7f) << 21) |
    ((buffer.readUInt8(offset + 1) & 0x7f) << 14) |
    ((buffer.readUInt8(offset + 2) & 0x7f) << 7) |
    (buffer.readUInt8(offset + 3) & 0x7f)
  );
}

function syncsafe(value: number): Buffer {
  return Buffer.from([(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]);
}

// Drops the 0x00 inserted after every 0xFF by tag-level unsynchronisation.
function resynchronise(buffer: Buffer): Buffer {
  const bytes: number[] = [];

  for (let index = 0; index < buffer.length; index++) {
    const byte = buffer.readUInt8(index);
    bytes.push(byte);

    if (byte === 0xff && index + 1 < buffer.length && buffer.readUInt8(index + 1) === 0x00) {
      index++;
    }
  }

  return Buffer.from(bytes);
}

/**
 * Lists every frame of the ID3v2.3 or v2.4 tag at the start of `buffer`,
 * whether or not a tag library knows its identifier.
 */
export function parseId3Tag(buffer: Buffer): Id3Tag | null {
  if (buffer.length < HEADER_LENGTH || buffer.toString('latin1', 0, 3) !== 'ID3') {
    return null;
  }

  const major = buffer.readUInt8(3);
  const version: Id3Version | null = major === 3 ? 3 : major === 4 ? 4 : null;

  if (version === null) {
    return null;
  }

  const tagFlags = buffer.readUInt8(5);
  const size = readSyncsafe(buffer, 6);
  const footer = version === 4 && (tagFlags & 0x10) !== 0 ? HEADER_LENGTH : 0;

  let body = buffer.subarray(HEADER_LENGTH, Math.min(HEADER_LENGTH + size, buffer.length));

  if (version === 3 && (tagFlags & 0x80) !== 0) {
    body = resynchronise(body);
  }

  let offset = 0;

  if ((tagFlags & 0x40) !== 0 && body.length >= 4) {
    offset = version === 3 ? 4 + body.readUInt32BE(0) : readSyncsafe(body, 0);
  }

  const frames: Id3Frame[] = [];

  while (offset + HEADER_LENGTH <= body.length) {
    const id = body.toString('latin1', offset, offset + 4);

    // padding
    if (!FRAME_ID.test(id)) {
      break;
    }

    const frameSize = version === 4 ? readSyncsafe(body, offset + 4) : body.readUInt32BE(offset + 4);
    const dataStart = offset + HEADER_LENGTH;

    if (dataStart + frameSize > body.length) {
      break;
    }

    frames.push({
      id,
      version,
      flags: Buffer.from(body.subarray(offset + 8, dataStart)),
      data: Buffer.from(body.subarray(dataStart, dataStart + frameSize)),
    });

    offset = dataStart + frameSize;
  }

  return { version, frames, length: HEADER_LENGTH + size + footer };
}

function isTextFrame(id: string): boolean {
  return id.startsWith('T') && id !== 'TXXX';
}

function utf16BigEndianToString(bytes: Buffer): string {
  const even = Buffer.from(bytes.subarray(0, bytes.length - (bytes.length % 2)));
  return even.swap16().toString('utf16le');
}

function decodeText(data: Buffer): string {
  const encoding = data.readUInt8(0);
  const body = data.subarray(1);
  let text: string;

  switch (encoding) {
    case 1:
      if (body.length >= 2 && body.readUInt8(0) === 0xfe && body.readUInt8(1) === 0xff) {
        text = utf16BigEndianToString(body.subarray(2));
      } else {
        const hasBom = body.length >= 2 && body.readUInt8(0) === 0xff && body.readUInt8(1) === 0xfe;
        text = body.subarray(hasBom ? 2 : 0).toString('utf16le');
      }
      break;
    case 2:
      text = utf16BigEndianToString(body);
      break;
    case 3:
      text = body.toString('utf8');
      break;
    default:
      text = body.toString('latin1');
  }

  return text.replace(/\0+$/, '').split('\0').join('; ');
}

/** Text frames read as their text; anything else as its size. */
export function describeFrame(frame: Id3Frame): string {
  if (isTextFrame(frame.id) && frame.data.length > 0) {
    return decodeText(frame.data);
  }

  return `(${frame.data.length} bytes)`;
}

function toVersion3(frame: Id3Frame): Id3Frame {
  if (frame.version === 3) {
    return frame;
  }

  const status = frame.flags.readUInt8(0);
  const format = frame.flags.readUInt8(1);

  if ((format & V24_FORMAT_FLAGS) !== 0) {
    throw new Error(`Cannot carry the ${frame.id} frame over to ID3v2.3 (format flags 0x${format.toString(16)})`);
  }

  let data = frame.data;

  // v2.3 has no UTF-8 text encoding; use UTF-16 with a byte order mark
  if (isTextFrame(frame.id) && data.length > 0 && data.readUInt8(0) === 3) {
    data = Buffer.concat([Buffer.from([1, 0xff, 0xfe]), Buffer.from(data.subarray(1).toString('utf8'), 'utf16le')]);
  }

  return {
    id: frame.id,
    version: 3,
    flags: Buffer.from([(status & 0x70) << 1, 0]),
    data,
  };
}

/** Serializes frames into an unpadded ID3v2.3 tag. */
export function encodeId3v23Tag(frames: Id3Frame[]): Buffer {
  const encoded = frames.map((frame) => {
    const converted = toVersion3(frame);
    const header = Buffer.alloc(HEADER_LENGTH);

    header.write(converted.id, 0, 'latin1');
    header.writeUInt32BE(converted.data.length, 4);
    converted.flags.copy(header, 8, 0, 2);

    return Buffer.concat([header, converted.data]);
  });

  const body = Buffer.concat(encoded);
  const header = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([3, 0, 0]), syncsafe(body.length)]);

  return Buffer.concat([header, body]);
}
