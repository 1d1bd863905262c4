/**
 * Error taxonomy for container parsing and image decoding.
 *
 * Every failure is terminal for the single operation that raised it; nothing is
 * retried and nothing is coerced into partial data.
 */

export type BltErrorCode =
  | 'TRUNCATED_INPUT'
  | 'OUT_OF_RANGE'
  | 'MALFORMED_CONTAINER'
  | 'NOT_FOUND'
  | 'UNSUPPORTED_COMPRESSION'
  | 'TRUNCATED_STREAM';

/**
 * Base class for every error raised by the BLT reader and decoders.
 */
export class BltError extends Error {
  constructor(readonly code: BltErrorCode, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'BltError';
  }
}

/** Fewer bytes are available than a field or operation requires. */
export class TruncatedInputError extends BltError {
  constructor(message: string) {
    super('TRUNCATED_INPUT', message);
    this.name = 'TruncatedInputError';
  }
}

/** A seek or offset points outside the source. */
export class OutOfRangeError extends BltError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
    this.name = 'OutOfRangeError';
  }
}

/** The container violates a structural invariant. */
export class MalformedContainerError extends BltError {
  constructor(message: string, cause?: unknown) {
    super('MALFORMED_CONTAINER', message, cause);
    this.name = 'MalformedContainerError';
  }
}

export class NotFoundError extends BltError {
  constructor(readonly resourceId: number) {
    super('NOT_FOUND', `Resource ${formatResourceId(resourceId)} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Image header names a compression code with no decoder. The raw code is kept for
 * diagnostic display.
 */
export class UnsupportedCompressionError extends BltError {
  constructor(readonly compression: number) {
    super('UNSUPPORTED_COMPRESSION', `Unsupported image compression type ${compression}`);
    this.name = 'UnsupportedCompressionError';
  }
}

/** RL7 input ran out before the pixel buffer was filled. */
export class TruncatedStreamError extends BltError {
  constructor(message: string) {
    super('TRUNCATED_STREAM', message);
    this.name = 'TruncatedStreamError';
  }
}

/**
 * Formats a resource id the way the inspector displays it, e.g. `0x01A2`.
 */
export function formatResourceId(id: number): string {
  return `0x${id.toString(16).toUpperCase().padStart(4, '0')}`;
}
