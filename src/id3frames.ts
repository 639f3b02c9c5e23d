/**
 * Frame-level access to ID3v2.3 / ID3v2.4 tags, for edits that must leave every
 * other frame byte-identical.
 */

const HEADER_SIZE = 10;
const FRAME_HEADER_SIZE = 10;

const FLAG_UNSYNCHRONISATION = 0x80;
const FLAG_EXTENDED_HEADER = 0x40;
const FLAG_FOOTER = 0x10;

export interface RawFrame {
  readonly id: string;
  /** Offset of the frame header within the file buffer. */
  readonly offset: number;
  /** Header plus body. */
  readonly length: number;
  /** Second flag byte: compression, encryption, grouping, unsynchronisation. */
  readonly formatFlags: number;
  readonly body: Buffer;
}

export interface RawTag {
  readonly version: 3 | 4;
  readonly flags: number;
  /** Tag size without the 10-byte header. */
  readonly size: number;
  /** Offset of the first frame. */
  readonly framesStart: number;
  readonly frames: readonly RawFrame[];
}

const readSyncsafe = (buffer: Buffer, offset: number): number =>
  ((buffer[offset] ?? 0) << 21) |
  ((buffer[offset + 1] ?? 0) << 14) |
  ((buffer[offset + 2] ?? 0) << 7) |
  (buffer[offset + 3] ?? 0);

const writeSyncsafe = (value: number): Buffer =>
  Buffer.from([(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]);

/**
 * Encodes one frame for a tag of the given version, with cleared flags.
 */
export const buildFrame = (id: string, body: Buffer, version: 3 | 4): Buffer => {
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.write(id, 0, 4, 'latin1');
  if (version === 3) {
    header.writeUInt32BE(body.length, 4);
  } else {
    writeSyncsafe(body.length).copy(header, 4);
  }
  return Buffer.concat([header, body]);
};

/**
 * Parses the tag at the start of `buffer`. Returns undefined for files without an
 * ID3v2.3/2.4 tag.
 */
export const readRawTag = (buffer: Buffer): RawTag | undefined => {
  if (buffer.length < HEADER_SIZE || buffer.toString('latin1', 0, 3) !== 'ID3') {
    return undefined;
  }
  const major = buffer[3];
  if (major !== 3 && major !== 4) {
    return undefined;
  }

  const flags = buffer[5] ?? 0;
  const size = readSyncsafe(buffer, 6);
  const end = Math.min(buffer.length, HEADER_SIZE + size);

  let framesStart = HEADER_SIZE;
  if (flags & FLAG_EXTENDED_HEADER) {
    framesStart += major === 3 ? 4 + buffer.readUInt32BE(HEADER_SIZE) : readSyncsafe(buffer, HEADER_SIZE);
  }

  const frames: RawFrame[] = [];
  let offset = framesStart;
  while (offset + FRAME_HEADER_SIZE <= end) {
    const id = buffer.toString('latin1', offset, offset + 4);
    if (!/^[A-Z0-9]{4}$/.test(id)) {
      break;
    }
    const bodySize = major === 3 ? buffer.readUInt32BE(offset + 4) : readSyncsafe(buffer, offset + 4);
    const bodyStart = offset + FRAME_HEADER_SIZE;
    if (bodyStart + bodySize > end) {
      break;
    }
    frames.push({
      id,
      offset,
      length: FRAME_HEADER_SIZE + bodySize,
      formatFlags: buffer[offset + 9] ?? 0,
      body: buffer.subarray(bodyStart, bodyStart + bodySize),
    });
    offset = bodyStart + bodySize;
  }

  return { version: major === 3 ? 3 : 4, flags, size, framesStart, frames };
};

const terminatorWidth = (encoding: number): number => (encoding === 1 || encoding === 2 ? 2 : 1);

/**
 * Index just past the first string terminator, or the end of `bytes`.
 */
const skipTerminated = (bytes: Buffer, encoding: number): number => {
  const width = terminatorWidth(encoding);
  for (let i = 0; i + width <= bytes.length; i += width) {
    if (bytes[i] === 0 && (width === 1 || bytes[i + 1] === 0)) {
      return i + width;
    }
  }
  return bytes.length;
};

const decodeText = (bytes: Buffer, encoding: number): string => {
  switch (encoding) {
    case 1: {
      if (bytes[0] === 0xfe && bytes[1] === 0xff) {
        return decodeText(bytes.subarray(2), 2);
      }
      const start = bytes[0] === 0xff && bytes[1] === 0xfe ? 2 : 0;
      return bytes.subarray(start, start + ((bytes.length - start) & ~1)).toString('utf16le');
    }
    case 2: {
      const swapped = Buffer.from(bytes.subarray(0, bytes.length & ~1));
      return swapped.swap16().toString('utf16le');
    }
    case 3:
      return bytes.toString('utf-8');
    default:
      return bytes.toString('latin1');
  }
};

/**
 * Text carried by a text-bearing frame (`T***`, `COMM`, `USLT`); undefined for
 * every other frame and for frames that are compressed or encrypted.
 */
export const frameText = (frame: RawFrame): string | undefined => {
  const isText = frame.id.startsWith('T');
  const isComment = frame.id === 'COMM' || frame.id === 'USLT';
  if ((!isText && !isComment) || frame.formatFlags !== 0) {
    return undefined;
  }

  const encoding = frame.body[0] ?? 0;
  let text = frame.body.subarray(1);
  if (isComment) {
    text = text.subarray(3);
    text = text.subarray(skipTerminated(text, encoding));
  } else if (frame.id === 'TXXX') {
    text = text.subarray(skipTerminated(text, encoding));
  }

  return decodeText(text, encoding)
    .split('\0')
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
    .join(' ');
};

export const isEmptyTextFrame = (frame: RawFrame): boolean => frameText(frame) === '';

const framesEndOf = (tag: RawTag): number => {
  const last = tag.frames.at(-1);
  return last ? last.offset + last.length : tag.framesStart;
};

const isRewritable = (buffer: Buffer, tag: RawTag): boolean =>
  (tag.flags & (FLAG_UNSYNCHRONISATION | FLAG_FOOTER)) === 0 && HEADER_SIZE + tag.size <= buffer.length;

/**
 * Removes the frames matching `drop` and pads the tag back to its old size, so the
 * audio data does not move. Every other frame is copied byte for byte. Returns
 * undefined when there is no tag or it uses a layout that cannot be rewritten in
 * place (whole-tag unsynchronisation, a footer).
 */
export const removeFrames = (
  buffer: Buffer,
  drop: (frame: RawFrame) => boolean,
): { buffer: Buffer; removed: string[] } | undefined => {
  const tag = readRawTag(buffer);
  if (!tag || !isRewritable(buffer, tag)) {
    return undefined;
  }

  const removed = tag.frames.filter(drop);
  if (removed.length === 0) {
    return { buffer, removed: [] };
  }

  const tagEnd = HEADER_SIZE + tag.size;
  const kept = tag.frames
    .filter((frame) => !removed.includes(frame))
    .map((frame) => buffer.subarray(frame.offset, frame.offset + frame.length));
  const content = Buffer.concat([
    buffer.subarray(0, tag.framesStart),
    ...kept,
    buffer.subarray(framesEndOf(tag), tagEnd),
  ]);

  return {
    buffer: Buffer.concat([content, Buffer.alloc(tagEnd - content.length), buffer.subarray(tagEnd)]),
    removed: removed.map((frame) => frame.id),
  };
};

/**
 * Adds frames after the last existing one, using the tag's padding when it is
 * large enough and growing the tag otherwise. Returns undefined when there is no
 * tag or it cannot be rewritten in place.
 */
export const appendFrames = (
  buffer: Buffer,
  frames: ReadonlyArray<{ readonly id: string; readonly body: Buffer }>,
): Buffer | undefined => {
  const tag = readRawTag(buffer);
  if (!tag || !isRewritable(buffer, tag)) {
    return undefined;
  }

  const framesEnd = framesEndOf(tag);
  const tagEnd = HEADER_SIZE + tag.size;
  const added = Buffer.concat(frames.map((frame) => buildFrame(frame.id, frame.body, tag.version)));

  if (framesEnd + added.length <= tagEnd) {
    return Buffer.concat([
      buffer.subarray(0, framesEnd),
      added,
      Buffer.alloc(tagEnd - framesEnd - added.length),
      buffer.subarray(tagEnd),
    ]);
  }

  const header = Buffer.from(buffer.subarray(0, HEADER_SIZE));
  writeSyncsafe(framesEnd + added.length - HEADER_SIZE).copy(header, 6);
  return Buffer.concat([header, buffer.subarray(HEADER_SIZE, framesEnd), added, buffer.subarray(tagEnd)]);
};
