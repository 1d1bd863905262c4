/**
 * BLT container reader.
 *
 * Parses the directory table and every resource table once at open time, then resolves
 * resources by id against the in-memory source.
 */
import { readFile } from 'node:fs/promises';
import { ByteCursor } from './byte-cursor.js';
import {
  BLT_MAGIC,
  DIRECTORY_ENTRY_SIZE,
  DIRECTORY_NAME_SIZE,
  DIRECTORY_TABLE_OFFSET,
  HEADER_DIRECTORY_COUNT_OFFSET,
  HEADER_FILE_SIZE_OFFSET,
  HEADER_SIZE,
  RESOURCE_ENTRY_SIZE,
  RESOURCE_NAME_SIZE,
  RESOURCE_TYPE_PADDING,
} from './constants/blt-layout.js';
import { MalformedContainerError, NotFoundError, formatResourceId } from './errors.js';
import type { BltResource, BltResourceEntry } from './types/blt-resource.js';
import type { BltDirectory, BltHeader } from './types/blt-structure.js';

/**
 * Validates the container magic and reads the fixed header.
 * @param source - Whole container file
 * @returns Directory count and recorded file size
 * @throws {MalformedContainerError} If the header is missing or the magic is wrong
 */
function readHeader(source: Uint8Array): BltHeader {
  if (source.length < HEADER_SIZE) {
    throw new MalformedContainerError(`File too small to be a BLT container: ${source.length} bytes`);
  }
  const cursor: ByteCursor = new ByteCursor(source);
  const magic: string = cursor.readFixedString(BLT_MAGIC.length);
  if (magic !== BLT_MAGIC) {
    throw new MalformedContainerError(`Invalid BLT magic "${magic}"`);
  }
  cursor.seek(HEADER_DIRECTORY_COUNT_OFFSET);
  const directoryCount: number = cursor.readU8();
  cursor.seek(HEADER_FILE_SIZE_OFFSET);
  const recordedSize: number = cursor.readU32();
  return { directoryCount, recordedSize };
}

/**
 * Checks that a table of fixed-size entries lies inside the file.
 * @param what - Table description for error messages
 * @param offset - Absolute offset of the first entry
 * @param count - Number of entries
 * @param entrySize - Size of one entry in bytes
 * @param fileSize - Length of the file
 * @throws {MalformedContainerError} If the table ends past the end of the file
 */
function ensureTableFits(what: string, offset: number, count: number, entrySize: number, fileSize: number): void {
  const end: number = offset + count * entrySize;
  if (end > fileSize) {
    throw new MalformedContainerError(
      `${what} extends beyond file bounds: offset=${offset}, entries=${count}, end=${end}, fileSize=${fileSize}`
    );
  }
}

/**
 * Parses one resource table entry at the cursor position.
 * Blank names fall back to the hex id.
 *
 * @param cursor - Cursor positioned on the entry; advanced past it
 * @param fileSize - Length of the file, for the payload bounds check
 * @returns Resource descriptor
 * @throws {MalformedContainerError} If the payload extends beyond the file
 */
function parseResourceEntry(cursor: ByteCursor, fileSize: number): BltResourceEntry {
  const id: number = cursor.readU32();
  const rawName: string = cursor.readFixedString(RESOURCE_NAME_SIZE);
  const type: number = cursor.readU8();
  cursor.skip(RESOURCE_TYPE_PADDING);
  const offset: number = cursor.readU32();
  const size: number = cursor.readU32();

  if (offset + size > fileSize) {
    throw new MalformedContainerError(
      `Resource ${formatResourceId(id)} data extends beyond file bounds: offset=${offset}, size=${size}, fileSize=${fileSize}`
    );
  }

  const name: string = rawName.length > 0 ? rawName : formatResourceId(id).slice(2);
  return { id, name, type, offset, size };
}

/**
 * Parses the directory table and each directory's resource table, in file order.
 *
 * @param source - Whole container file
 * @param header - Parsed file header
 * @returns Directories with their resource descriptors
 * @throws {MalformedContainerError} If any table or payload lies outside the file
 */
function parseDirectories(source: Uint8Array, header: BltHeader): BltDirectory[] {
  const fileSize: number = source.length;
  ensureTableFits('Directory table', DIRECTORY_TABLE_OFFSET, header.directoryCount, DIRECTORY_ENTRY_SIZE, fileSize);

  const cursor: ByteCursor = new ByteCursor(source, DIRECTORY_TABLE_OFFSET);
  const directories: BltDirectory[] = [];

  for (let index = 0; index < header.directoryCount; index++) {
    cursor.seek(DIRECTORY_TABLE_OFFSET + index * DIRECTORY_ENTRY_SIZE);
    const rawName: string = cursor.readFixedString(DIRECTORY_NAME_SIZE);
    const resourceCount: number = cursor.readU32();
    const tableOffset: number = cursor.readU32();
    const name: string = rawName.length > 0 ? rawName : `DIR_${index}`;

    ensureTableFits(`Resource table of directory "${name}"`, tableOffset, resourceCount, RESOURCE_ENTRY_SIZE, fileSize);

    const tableCursor: ByteCursor = new ByteCursor(source, tableOffset);
    const resources: BltResourceEntry[] = [];
    for (let entry = 0; entry < resourceCount; entry++) {
      resources.push(parseResourceEntry(tableCursor, fileSize));
    }
    directories.push({ name, tableOffset, resources });
  }

  return directories;
}

/**
 * Indexes every resource by id across all directories.
 *
 * @param directories - Parsed directories
 * @returns Map from resource id to descriptor
 * @throws {MalformedContainerError} If two resources share an id
 */
function indexResources(directories: readonly BltDirectory[]): Map<number, BltResourceEntry> {
  const byId = new Map<number, BltResourceEntry>();
  for (const directory of directories) {
    for (const resource of directory.resources) {
      const existing: BltResourceEntry | undefined = byId.get(resource.id);
      if (existing) {
        throw new MalformedContainerError(
          `Duplicate resource id ${formatResourceId(resource.id)} ("${existing.name}" and "${resource.name}")`
        );
      }
      byId.set(resource.id, resource);
    }
  }
  return byId;
}

/**
 * An opened BLT container.
 *
 * The source is treated as immutable once opened. Payloads are not cached: every
 * {@link BltContainer.loadResource} call reads a fresh copy.
 */
export class BltContainer {
  private constructor(
    private readonly source: Uint8Array,
    readonly header: BltHeader,
    private readonly directories: readonly BltDirectory[],
    private readonly resourcesById: ReadonlyMap<number, BltResourceEntry>
  ) {}

  /**
   * Parses a container held in memory.
   * @throws {MalformedContainerError} If a table is out of bounds or an id repeats
   */
  static open(source: Uint8Array): BltContainer {
    const header: BltHeader = readHeader(source);
    if (header.recordedSize !== source.length) {
      console.warn(`BLT header records ${header.recordedSize} bytes but the file has ${source.length}`);
    }
    const directories: BltDirectory[] = parseDirectories(source, header);
    return new BltContainer(source, header, directories, indexResources(directories));
  }

  /**
   * Reads a container file from disk and parses it.
   *
   * @param filePath - Path to the BLT file
   * @returns Opened container
   * @throws {MalformedContainerError} If the file is not a valid container; the message is prefixed with the path
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<BltContainer> {
    const buffer: Buffer = await readFile(filePath);
    try {
      return BltContainer.open(buffer);
    } catch (error) {
      if (error instanceof MalformedContainerError) {
        throw new MalformedContainerError(`${filePath}: ${error.message}`, error);
      }
      throw error;
    }
  }

  fileSize(): number {
    return this.source.length;
  }

  listDirectories(): readonly BltDirectory[] {
    return this.directories;
  }

  findResource(id: number): BltResourceEntry | undefined {
    return this.resourcesById.get(id);
  }

  /**
   * Reads the payload of a resource.
   * @throws {NotFoundError} If no resource has this id
   * @throws {TruncatedInputError} If the source is shorter than the recorded payload
   */
  loadResource(id: number): BltResource {
    const entry: BltResourceEntry | undefined = this.resourcesById.get(id);
    if (!entry) {
      throw new NotFoundError(id);
    }
    const cursor: ByteCursor = new ByteCursor(this.source, entry.offset);
    const data: Uint8Array = Uint8Array.from(cursor.slice(entry.size));
    return { id: entry.id, type: entry.type, size: entry.size, data };
  }
}
