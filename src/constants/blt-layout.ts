/**
 * Byte layout of the BLT container tables. All integers are big-endian.
 */

export const BLT_MAGIC = 'BOLT';

export const HEADER_SIZE = 0x10;
export const HEADER_DIRECTORY_COUNT_OFFSET = 0x0b;
export const HEADER_FILE_SIZE_OFFSET = 0x0c;

export const DIRECTORY_TABLE_OFFSET = HEADER_SIZE;
export const DIRECTORY_ENTRY_SIZE = 16;
export const DIRECTORY_NAME_SIZE = 8;

export const RESOURCE_ENTRY_SIZE = 24;
export const RESOURCE_NAME_SIZE = 8;
/** Bytes between the type code and the payload offset. */
export const RESOURCE_TYPE_PADDING = 3;
