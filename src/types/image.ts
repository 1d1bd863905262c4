/**
 * Image resource structures.
 */

export enum ImageCompression {
  CLUT7 = 0,
  RL7 = 1,
}

/**
 * Parsed 16-byte image header. Pixel data starts at offset 24 of the payload, after
 * eight reserved bytes.
 */
export interface BltImageHeader {
  /** Raw compression code; see {@link ImageCompression}. */
  readonly compression: number;
  readonly unknown1: number;
  readonly unknown2: number;
  readonly unknown4: number;
  readonly offsetX: number;
  readonly offsetY: number;
  readonly width: number;
  readonly height: number;
}

export interface BltImage {
  readonly header: BltImageHeader;
  /** One palette index per pixel, row-major, `width * height` bytes. */
  readonly pixels: Uint8Array;
}
