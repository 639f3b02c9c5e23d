import { describe, expect, it } from 'vitest';
import { appendFrames, frameText, readRawTag, removeFrames, type RawFrame } from '../src/id3frames.js';
import { FAKE_AUDIO, id3v23File, textFrame } from './testUtils.js';

const frame = (id: string, body: number[], formatFlags = 0): RawFrame => ({
  id,
  offset: 0,
  length: 10 + body.length,
  formatFlags,
  body: Buffer.from(body),
});

describe('frameText', () => {
  it('decodes each text encoding', () => {
    expect(frameText(frame('TIT2', [0, 0x48, 0x69]))).toBe('Hi');
    expect(frameText(frame('TIT2', [1, 0xff, 0xfe, 0x48, 0, 0x69, 0]))).toBe('Hi');
    expect(frameText(frame('TIT2', [1, 0xfe, 0xff, 0, 0x48, 0, 0x69]))).toBe('Hi');
    expect(frameText(frame('TIT2', [3, 0xc3, 0xa9]))).toBe('é');
  });

  it('treats a byte order mark alone as empty', () => {
    expect(frameText(frame('TPE1', [1, 0xff, 0xfe]))).toBe('');
  });

  it('skips the description of comments and user text', () => {
    expect(frameText(frame('COMM', [0, 0x65, 0x6e, 0x67, 0x64, 0, 0x78]))).toBe('x');
    expect(frameText(frame('TXXX', [0, 0x64, 0, 0x20]))).toBe('');
  });

  it('ignores pictures and compressed frames', () => {
    expect(frameText(frame('APIC', [0]))).toBeUndefined();
    expect(frameText(frame('TIT2', [0], 0x80))).toBeUndefined();
  });
});

describe('readRawTag', () => {
  it('lists frames up to the padding', () => {
    const tag = readRawTag(id3v23File([textFrame('TIT2', 'A'), textFrame('TCMP', '1')]));
    expect(tag?.version).toBe(3);
    expect(tag?.frames.map((entry) => entry.id)).toEqual(['TIT2', 'TCMP']);
    expect(tag?.frames[1]?.offset).toBe(22);
  });

  it('returns undefined without a tag', () => {
    expect(readRawTag(Buffer.from('not really audio'))).toBeUndefined();
    expect(removeFrames(Buffer.from('not really audio'), () => true)).toBeUndefined();
  });
});

describe('appendFrames', () => {
  it('uses the padding when it is large enough', () => {
    const original = id3v23File([textFrame('TIT2', 'A')], 32);
    const appended = appendFrames(original, [textFrame('TCMP', '1')]);

    expect(appended?.length).toBe(original.length);
    expect(appended && readRawTag(appended)?.frames.map((entry) => entry.id)).toEqual(['TIT2', 'TCMP']);
  });

  it('grows the tag when there is no padding', () => {
    const original = id3v23File([textFrame('TIT2', 'A')], 0);
    const appended = appendFrames(original, [textFrame('TCMP', '1')]);

    expect(appended?.length).toBe(original.length + 12);
    expect(appended && readRawTag(appended)?.size).toBe(24);
    expect(appended?.subarray(-FAKE_AUDIO.length)).toEqual(FAKE_AUDIO);
  });
});
