/**
 * Plain-text renderings of resource payloads for the inspector.
 */
import { ByteCursor } from './byte-cursor.js';
import { compressionName } from './image.js';
import type { StructField } from './resource-types.js';
import type { BltImageHeader } from './types/image.js';

const HEX_DUMP_WIDTH = 16;

export interface RgbColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Field values of one decoded record, in field order; arrays for fields with `count > 1`. */
export type StructRecord = ReadonlyArray<readonly [StructField, readonly number[]]>;

export function formatHex(value: number, digits: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(digits, '0')}`;
}

/**
 * Classic hex dump: 8-digit offset, 16 bytes per line, an extra gap after the 8th byte.
 */
export function formatHexDump(data: Uint8Array): string[] {
  const lines: string[] = [];
  for (let address = 0; address < data.length; address += HEX_DUMP_WIDTH) {
    let line = `${address.toString(16).toUpperCase().padStart(8, '0')} `;
    const count = Math.min(HEX_DUMP_WIDTH, data.length - address);
    for (let i = 0; i < count; i++) {
      if (i === 8) {
        line += ' ';
      }
      line += ` ${data[address + i].toString(16).toUpperCase().padStart(2, '0')}`;
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Reads consecutive big-endian unsigned values; a trailing partial value is ignored.
 */
export function readValues(data: Uint8Array, byteWidth: 1 | 2 | 4): number[] {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const values: number[] = [];
  for (let offset = 0; offset + byteWidth <= data.length; offset += byteWidth) {
    switch (byteWidth) {
      case 1:
        values.push(view.getUint8(offset));
        break;
      case 2:
        values.push(view.getUint16(offset));
        break;
      case 4:
        values.push(view.getUint32(offset));
        break;
    }
  }
  return values;
}

/**
 * Reads RGB triples after `headerSize` bytes; a trailing partial triple is ignored.
 */
export function readColors(data: Uint8Array, headerSize = 0): RgbColor[] {
  const colors: RgbColor[] = [];
  for (let offset = headerSize; offset + 3 <= data.length; offset += 3) {
    colors.push({ r: data[offset], g: data[offset + 1], b: data[offset + 2] });
  }
  return colors;
}

export function formatColor({ r, g, b }: RgbColor): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).toUpperCase().padStart(2, '0')).join('')}`;
}

/** Label/value rows describing an image header. */
export function describeImageHeader(header: BltImageHeader): Array<readonly [string, string]> {
  return [
    ['Compression', `${compressionName(header.compression)} (${header.compression})`],
    ['Unk @1', formatHex(header.unknown1, 2)],
    ['Unk @2', formatHex(header.unknown2, 4)],
    ['Unk @4', formatHex(header.unknown4, 4)],
    ['Offset', `(${header.offsetX}, ${header.offsetY})`],
    ['Width', `${header.width}`],
    ['Height', `${header.height}`],
  ];
}

export function structRecordSize(fields: readonly StructField[]): number {
  return fields.reduce((total, field) => total + field.width * field.count, 0);
}

function readField(cursor: ByteCursor, { width, signed }: StructField): number {
  switch (width) {
    case 1:
      return signed ? cursor.readI8() : cursor.readU8();
    case 2:
      return signed ? cursor.readI16() : cursor.readU16();
    case 4:
      return signed ? cursor.readI32() : cursor.readU32();
  }
}

function readRecord(cursor: ByteCursor, fields: readonly StructField[]): StructRecord {
  return fields.map((field): readonly [StructField, number[]] => {
    const values: number[] = [];
    for (let i = 0; i < field.count; i++) {
      values.push(readField(cursor, field));
    }
    return [field, values];
  });
}

/**
 * Decodes fixed-layout records. A repeated layout reads as many whole records as fit and
 * ignores a trailing partial one; a single record must fit.
 *
 * @param data - Resource payload
 * @param fields - Record layout, in file order
 * @param repeat - Whether the payload is a packed array of records
 * @returns Decoded records
 * @throws {TruncatedInputError} If a single record is longer than the payload
 */
export function readStructRecords(data: Uint8Array, fields: readonly StructField[], repeat: boolean): StructRecord[] {
  const cursor: ByteCursor = new ByteCursor(data);
  if (!repeat) {
    return [readRecord(cursor, fields)];
  }
  const recordCount: number = Math.floor(data.length / structRecordSize(fields));
  const records: StructRecord[] = [];
  for (let i = 0; i < recordCount; i++) {
    records.push(readRecord(cursor, fields));
  }
  return records;
}

export function formatFieldValue(value: number, { width, format }: StructField): string {
  if (format === 'decimal') {
    return `${value}`;
  }
  // Signed values are shown in two's complement.
  return formatHex(value < 0 ? value + 2 ** (width * 8) : value, width * 2);
}

function formatFieldValues(field: StructField, values: readonly number[]): string {
  const formatted: string[] = values.map((value) => formatFieldValue(value, field));
  return field.count > 1 ? `[${formatted.join(', ')}]` : formatted[0];
}

/**
 * `Name: value` lines for a single record; elements of array fields get their own line.
 */
export function formatStructRecord(record: StructRecord): string[] {
  const lines: string[] = [];
  for (const [field, values] of record) {
    if (field.count > 1) {
      values.forEach((value, index) => lines.push(`${field.name} ${index}: ${formatFieldValue(value, field)}`));
    } else {
      lines.push(`${field.name}: ${formatFieldValue(values[0], field)}`);
    }
  }
  return lines;
}

/** One `index: Name=value, ...` line per record. */
export function formatStructTable(records: readonly StructRecord[]): string[] {
  return records.map(
    (record, index) => `${index}: ${record.map(([field, values]) => `${field.name}=${formatFieldValues(field, values)}`).join(', ')}`
  );
}
