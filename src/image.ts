/**
 * Image resource dispatch: header parsing and CLUT7/RL7 pixel decoding.
 *
 * Callers decide a resource is an image (by its type code) before handing the payload
 * over; nothing here inspects type codes.
 */
import { ByteCursor } from './byte-cursor.js';
import { TruncatedInputError, UnsupportedCompressionError } from './errors.js';
import { decodeRl7 } from './rl7.js';
import { ImageCompression, type BltImage, type BltImageHeader } from './types/image.js';

export const IMAGE_HEADER_SIZE = 16;
export const IMAGE_DATA_OFFSET = 0x18;

const COMPRESSION_NAMES: Readonly<Record<number, string>> = {
  [ImageCompression.CLUT7]: 'CLUT7',
  [ImageCompression.RL7]: 'RL7',
};

export function compressionName(compression: number): string {
  return COMPRESSION_NAMES[compression] ?? 'Unknown';
}

/**
 * @throws {TruncatedInputError} If the payload is shorter than the header
 */
export function parseImageHeader(payload: Uint8Array): BltImageHeader {
  const cursor = new ByteCursor(payload);
  const compression = cursor.readU8();
  const unknown1 = cursor.readU8();
  const unknown2 = cursor.readU16();
  const unknown4 = cursor.readU16();
  const offsetX = cursor.readI16();
  const offsetY = cursor.readI16();
  const width = cursor.readU16();
  const height = cursor.readU16();
  // Last four header bytes are reserved.
  cursor.skip(IMAGE_HEADER_SIZE - cursor.offset);
  return { compression, unknown1, unknown2, unknown4, offsetX, offsetY, width, height };
}

/**
 * Decodes an image payload into palette indices.
 *
 * @throws {UnsupportedCompressionError} For any compression other than CLUT7 or RL7
 * @throws {TruncatedInputError} If CLUT7 pixel data is shorter than the image
 * @throws {TruncatedStreamError} If the RL7 stream ends early
 */
export function decodeImage(payload: Uint8Array): BltImage {
  const header = parseImageHeader(payload);
  const pixelCount = header.width * header.height;

  switch (header.compression) {
    case ImageCompression.CLUT7: {
      const end = IMAGE_DATA_OFFSET + pixelCount;
      if (payload.length < end) {
        throw new TruncatedInputError(
          `CLUT7 image needs ${pixelCount} pixel bytes, payload has ${Math.max(payload.length - IMAGE_DATA_OFFSET, 0)}`
        );
      }
      return { header, pixels: Uint8Array.from(payload.subarray(IMAGE_DATA_OFFSET, end)) };
    }
    case ImageCompression.RL7:
      return { header, pixels: decodeRl7(payload.subarray(IMAGE_DATA_OFFSET), header.width, header.height) };
    default:
      throw new UnsupportedCompressionError(header.compression);
  }
}
