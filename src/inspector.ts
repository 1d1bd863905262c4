/**
 * Inspector operations behind the CLI: container listings, typed resource views and
 * payload/image extraction.
 */
import { writeFile } from 'node:fs/promises';
import { BltContainer } from './blt-container.js';
import { BltError, formatResourceId } from './errors.js';
import { IMAGE_HEADER_SIZE, decodeImage, parseImageHeader } from './image.js';
import { detectPlatform, type Platform, type PlatformDetection } from './platform.js';
import type { ResourceHandler, ResourceTypeRegistry } from './resource-types.js';
import type { BltResource } from './types/blt-resource.js';
import type { BltImage } from './types/image.js';
import {
  describeImageHeader,
  formatColor,
  formatHex,
  formatStructRecord,
  formatStructTable,
  readColors,
  readStructRecords,
  readValues,
  type StructRecord,
} from './views.js';

export interface ResourceListing {
  readonly id: number;
  readonly name: string;
  readonly type: number;
  readonly typeDescription: string;
  readonly size: number;
}

export interface DirectoryListing {
  readonly name: string;
  readonly resources: readonly ResourceListing[];
}

export interface ContainerListing {
  readonly fileSize: number;
  /** Null when the file size matches no known game. */
  readonly gameName: string | null;
  readonly platform: Platform;
  readonly directories: readonly DirectoryListing[];
}

/**
 * Picks the platform for a container: an explicit override wins over size detection.
 */
export function resolvePlatform(container: BltContainer, override?: Platform): PlatformDetection {
  const detected: PlatformDetection = detectPlatform(container.fileSize());
  return { gameName: detected.gameName, platform: override ?? detected.platform };
}

export function buildListing(container: BltContainer, registry: ResourceTypeRegistry, platformOverride?: Platform): ContainerListing {
  const { gameName, platform } = resolvePlatform(container, platformOverride);
  const directories: DirectoryListing[] = container.listDirectories().map((directory) => ({
    name: directory.name,
    resources: directory.resources.map((resource) => ({
      id: resource.id,
      name: resource.name,
      type: resource.type,
      typeDescription: registry.describeType(platform, resource.type),
      size: resource.size,
    })),
  }));
  return { fileSize: container.fileSize(), gameName, platform, directories };
}

export function formatListing(listing: ContainerListing): string[] {
  const lines: string[] = [
    listing.gameName !== null
      ? `Detected game: ${listing.gameName}`
      : `Detected unknown game (file size: ${listing.fileSize} bytes). Assuming ${listing.platform} platform.`,
  ];
  for (const directory of listing.directories) {
    lines.push(`${directory.name} (${directory.resources.length} resources)`);
    for (const resource of directory.resources) {
      lines.push(`  ${formatResourceId(resource.id)}  ${resource.name.padEnd(8)}  ${resource.typeDescription.padEnd(24)}  ${resource.size}`);
    }
  }
  return lines;
}

function imageHeaderLines(payload: Uint8Array): string[] {
  if (payload.length < IMAGE_HEADER_SIZE) {
    return [];
  }
  return describeImageHeader(parseImageHeader(payload)).map(([label, value]) => `${label}: ${value}`);
}

/**
 * Renders the typed view of a resource. Decode failures of images and records are
 * reported in the view rather than thrown so the hex dump can still be shown.
 */
export function renderResource(resource: BltResource, handler: ResourceHandler | undefined): string[] {
  if (!handler) {
    return [`No viewer for type ${resource.type}.`];
  }
  switch (handler.kind) {
    case 'image': {
      let image: BltImage;
      try {
        image = decodeImage(resource.data);
      } catch (error) {
        if (!(error instanceof BltError)) {
          throw error;
        }
        return [...imageHeaderLines(resource.data), `Decode failed: ${error.message}`];
      }
      return [...imageHeaderLines(resource.data), `Decoded ${image.pixels.length} pixels.`];
    }
    case 'values': {
      const { byteWidth } = handler;
      return readValues(resource.data, byteWidth).map((value, index) => `${index}: ${formatHex(value, byteWidth * 2)}`);
    }
    case 'colors':
      return readColors(resource.data, handler.headerSize).map((color, index) => `${index}: ${formatColor(color)}`);
    case 'struct': {
      let records: StructRecord[];
      try {
        records = readStructRecords(resource.data, handler.fields, handler.repeat);
      } catch (error) {
        if (!(error instanceof BltError)) {
          throw error;
        }
        return [`Decode failed: ${error.message}`];
      }
      return handler.repeat ? formatStructTable(records) : formatStructRecord(records[0]);
    }
    case 'unhandled':
      return [`No viewer for ${handler.name} resources.`];
  }
}

/**
 * Writes the raw payload of one resource to disk.
 */
export async function extractResource({ filePath, id, outputFile }: { readonly filePath: string; readonly id: number; readonly outputFile: string }): Promise<BltResource> {
  const container = await BltContainer.read({ filePath });
  const resource = container.loadResource(id);
  await writeFile(outputFile, resource.data);
  return resource;
}

/**
 * Decodes one image resource and writes its palette indices (one byte per pixel,
 * row-major) to disk.
 */
export async function extractImage({ filePath, id, outputFile }: { readonly filePath: string; readonly id: number; readonly outputFile: string }): Promise<BltImage> {
  const container = await BltContainer.read({ filePath });
  const image = decodeImage(container.loadResource(id).data);
  await writeFile(outputFile, image.pixels);
  return image;
}
