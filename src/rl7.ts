/**
 * RL7 run-length decoder for 7-bit indexed-colour images.
 *
 * Each opcode byte carries a palette index in its low seven bits. With bit 7 clear it
 * is a single pixel; with bit 7 set the following byte is a run length, where 0 means
 * "fill to the end of the current row".
 */
import { TruncatedStreamError } from './errors.js';

const RUN_FLAG = 0x80;
const COLOR_MASK = 0x7f;

/**
 * Decodes an RL7 stream into a row-major buffer of exactly `width * height` indices.
 * Decoding stops as soon as the buffer is full; trailing input is ignored.
 *
 * @throws {TruncatedStreamError} If the input ends before the buffer is filled
 */
export function decodeRl7(data: Uint8Array, width: number, height: number): Uint8Array {
  const total = width * height;
  const pixels = new Uint8Array(total);
  let written = 0;
  let read = 0;

  while (written < total) {
    if (read >= data.length) {
      throw new TruncatedStreamError(`RL7 stream ended after ${written} of ${total} pixels`);
    }
    const op = data[read++];
    const color = op & COLOR_MASK;

    if ((op & RUN_FLAG) === 0) {
      pixels[written++] = color;
      continue;
    }

    if (read >= data.length) {
      throw new TruncatedStreamError(`RL7 run at byte ${read - 1} is missing its length`);
    }
    let runLength = data[read++];
    if (runLength === 0) {
      runLength = width - (written % width);
    }
    const end = Math.min(written + runLength, total);
    pixels.fill(color, written, end);
    written = end;
  }

  return pixels;
}
