/**
 * Sequential big-endian reader over an in-memory byte source.
 */
import { OutOfRangeError, TruncatedInputError } from './errors.js';

export class ByteCursor {
  private readonly buffer: Buffer;
  private position: number;

  constructor(source: Uint8Array, offset = 0) {
    this.buffer = Buffer.from(source.buffer, source.byteOffset, source.byteLength);
    this.position = 0;
    this.seek(offset);
  }

  get offset(): number {
    return this.position;
  }

  get length(): number {
    return this.buffer.length;
  }

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  /**
   * Moves to an absolute offset. The end of the source is a valid position.
   * @throws {OutOfRangeError} If the offset lies outside the source
   */
  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buffer.length) {
      throw new OutOfRangeError(`Seek to ${offset} outside source of ${this.buffer.length} bytes`);
    }
    this.position = offset;
  }

  readU8(): number {
    this.require(1);
    const value: number = this.buffer.readUInt8(this.position);
    this.position += 1;
    return value;
  }

  readI8(): number {
    this.require(1);
    const value: number = this.buffer.readInt8(this.position);
    this.position += 1;
    return value;
  }

  readU16(): number {
    this.require(2);
    const value: number = this.buffer.readUInt16BE(this.position);
    this.position += 2;
    return value;
  }

  readI16(): number {
    this.require(2);
    const value: number = this.buffer.readInt16BE(this.position);
    this.position += 2;
    return value;
  }

  readU32(): number {
    this.require(4);
    const value: number = this.buffer.readUInt32BE(this.position);
    this.position += 4;
    return value;
  }

  readI32(): number {
    this.require(4);
    const value: number = this.buffer.readInt32BE(this.position);
    this.position += 4;
    return value;
  }

  /**
   * Returns the next `length` bytes as a view over the source and advances past them.
   * @throws {TruncatedInputError} If fewer than `length` bytes remain
   */
  slice(length: number): Uint8Array {
    this.require(length);
    const bytes: Uint8Array = this.buffer.subarray(this.position, this.position + length);
    this.position += length;
    return bytes;
  }

  skip(length: number): void {
    this.require(length);
    this.position += length;
  }

  /**
   * Reads a fixed-width ASCII field, dropping everything from the first NUL.
   * @param length - Field width in bytes
   * @returns Field text without padding
   */
  readFixedString(length: number): string {
    const bytes: Uint8Array = this.slice(length);
    const end: number = bytes.indexOf(0);
    return Buffer.from(end === -1 ? bytes : bytes.subarray(0, end)).toString('latin1');
  }

  /**
   * Checks that `length` bytes can be read at the current position.
   * @param length - Number of bytes the next read consumes
   * @throws {TruncatedInputError} If fewer bytes remain
   */
  private require(length: number): void {
    if (!Number.isInteger(length) || length < 0) {
      throw new OutOfRangeError(`Invalid read length ${length}`);
    }
    if (length > this.remaining) {
      throw new TruncatedInputError(
        `Need ${length} bytes at offset ${this.position}, only ${this.remaining} available`
      );
    }
  }
}
