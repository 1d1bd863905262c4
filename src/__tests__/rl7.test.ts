import { describe, it, expect } from 'vitest';
import { decodeRl7 } from '../rl7.js';
import { TruncatedStreamError } from '../errors.js';

function decode(bytes: number[], width: number, height: number): number[] {
  return Array.from(decodeRl7(Uint8Array.from(bytes), width, height));
}

describe('RL7 opcodes', () => {
  it('decodes single pixels', () => {
    expect(decode([0x01, 0x02, 0x03, 0x04], 2, 2)).toEqual([1, 2, 3, 4]);
  });

  it('decodes runs with an explicit length', () => {
    expect(decode([0x85, 3, 0x06], 4, 1)).toEqual([5, 5, 5, 6]);
  });

  it('fills to the end of the row when the run length is zero', () => {
    expect(decode([0x01, 0x82, 0x00, 0x83, 0x00], 4, 2)).toEqual([1, 2, 2, 2, 3, 3, 3, 3]);
  });

  it('continues a run into the next row', () => {
    expect(decode([0x87, 3, 0x01], 2, 2)).toEqual([7, 7, 7, 1]);
  });

  it('keeps only the low seven bits as the colour', () => {
    expect(decode([0xff, 2], 2, 1)).toEqual([0x7f, 0x7f]);
  });
});

describe('RL7 output size', () => {
  it('clips a run at the end of the buffer', () => {
    expect(decode([0x89, 200], 2, 2)).toEqual([9, 9, 9, 9]);
  });

  it('ignores bytes after the buffer is full', () => {
    expect(decode([1, 2, 3, 4, 0x55, 0x56], 2, 2)).toEqual([1, 2, 3, 4]);
  });

  it('decodes a zero-area image without reading input', () => {
    expect(decodeRl7(new Uint8Array(0), 0, 5)).toHaveLength(0);
  });

  it('is deterministic', () => {
    const input = Uint8Array.from([0x81, 0x00, 0x05, 0x86, 2, 0x07]);
    expect(decodeRl7(input, 4, 2)).toEqual(decodeRl7(input, 4, 2));
  });
});

describe('RL7 truncation', () => {
  it('fails when the stream ends before the buffer is full', () => {
    expect(() => decode([0x01], 2, 1)).toThrow(TruncatedStreamError);
  });

  it('fails when a run is missing its length byte', () => {
    expect(() => decode([0x01, 0x85], 4, 1)).toThrow('RL7 run at byte 1 is missing its length');
  });

  it('reports how many pixels were decoded', () => {
    expect(() => decode([0x83, 2], 2, 2)).toThrow('RL7 stream ended after 2 of 4 pixels');
  });
});
