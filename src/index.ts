/**
 * BLT Inspector - Main entry point
 *
 * Reads BLT resource containers and decodes their CLUT7 and RL7 images.
 */

// Container reading
export { BltContainer } from './blt-container.js';
export { ByteCursor } from './byte-cursor.js';
export type { BltResource, BltResourceEntry } from './types/blt-resource.js';
export type { BltDirectory, BltHeader } from './types/blt-structure.js';

// Image decoding
export { decodeRl7 } from './rl7.js';
export { decodeImage, parseImageHeader, compressionName, IMAGE_DATA_OFFSET, IMAGE_HEADER_SIZE } from './image.js';
export { ImageCompression } from './types/image.js';
export type { BltImage, BltImageHeader } from './types/image.js';

// Errors
export {
  BltError,
  TruncatedInputError,
  OutOfRangeError,
  MalformedContainerError,
  NotFoundError,
  UnsupportedCompressionError,
  TruncatedStreamError,
  formatResourceId,
} from './errors.js';
export type { BltErrorCode } from './errors.js';

// Platform and resource types
export { detectPlatform, parsePlatform, PLATFORMS } from './platform.js';
export type { Platform, PlatformDetection } from './platform.js';
export { ResourceTypeRegistry, loadResourceTypeRegistry } from './resource-types.js';
export type { ResourceHandler, ResourceTypeTables, StructField } from './resource-types.js';

// Views
export { formatHexDump, readStructRecords, formatStructRecord, formatStructTable } from './views.js';
export type { StructRecord } from './views.js';
