import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BltContainer } from '../blt-container.js';
import { buildListing, extractImage, extractResource, formatListing, renderResource } from '../inspector.js';
import { NotFoundError, TruncatedInputError } from '../errors.js';
import { loadResourceTypeRegistry } from '../resource-types.js';
import type { BltResource } from '../types/blt-resource.js';
import { buildContainer, buildImagePayload } from './helpers/blt-fixtures.js';

const registry = loadResourceTypeRegistry();
const clut7Payload = buildImagePayload({ compression: 0, width: 4, height: 2 }, [1, 2, 3, 4, 5, 6, 7, 8]);

function sampleContainer(): Buffer {
  return buildContainer([
    {
      name: 'MAIN',
      resources: [
        { id: 0x0001, type: 8, offset: 1024, data: clut7Payload },
        { id: 0x0002, name: 'SPR', type: 27, offset: 100, data: Uint8Array.from([0, 1]) },
      ],
    },
  ]);
}

function resourceOf(type: number, data: number[] | Uint8Array): BltResource {
  const bytes = Uint8Array.from(data);
  return { id: 0x0042, type, size: bytes.length, data: bytes };
}

describe('container listing', () => {
  it('lists resources with their type descriptions', () => {
    const listing = buildListing(BltContainer.open(sampleContainer()), registry);
    expect(listing.gameName).toBeNull();
    expect(listing.platform).toBe('PC');
    expect(listing.directories[0].resources[1]).toEqual({ id: 2, name: 'SPR', type: 27, typeDescription: 'Sprites (27)', size: 2 });
  });

  it('applies a platform override', () => {
    const listing = buildListing(BltContainer.open(sampleContainer()), registry, 'CDI');
    expect(listing.platform).toBe('CDI');
    expect(listing.directories[0].resources[1].typeDescription).toBe('Plane (27)');
  });

  it('formats the listing as text', () => {
    const listing = buildListing(BltContainer.open(sampleContainer()), registry);
    expect(formatListing(listing)).toEqual([
      'Detected unknown game (file size: 1064 bytes). Assuming PC platform.',
      'MAIN (2 resources)',
      '  0x0001  0001      Image (8)' + ' '.repeat(17) + '40',
      '  0x0002  SPR       Sprites (27)' + ' '.repeat(14) + '2',
    ]);
  });
});

describe('renderResource', () => {
  it('shows the image header and decoded size', () => {
    const resource = resourceOf(8, clut7Payload);
    expect(renderResource(resource, registry.lookup('PC', 8))).toEqual([
      'Compression: CLUT7 (0)',
      'Unk @1: 0x00',
      'Unk @2: 0x0000',
      'Unk @4: 0x0000',
      'Offset: (0, 0)',
      'Width: 4',
      'Height: 2',
      'Decoded 8 pixels.',
    ]);
  });

  it('reports image decode failures in the view', () => {
    const resource = resourceOf(8, buildImagePayload({ compression: 5, width: 1, height: 1 }, [0]));
    const lines = renderResource(resource, registry.lookup('PC', 8));
    expect(lines[0]).toBe('Compression: Unknown (5)');
    expect(lines[lines.length - 1]).toBe('Decode failed: Unsupported image compression type 5');
  });

  it('reports a payload too short for an image header', () => {
    expect(renderResource(resourceOf(8, [0, 0]), registry.lookup('PC', 8))).toEqual([
      'Decode failed: Need 2 bytes at offset 2, only 0 available',
    ]);
  });

  it('lists 16-bit values', () => {
    expect(renderResource(resourceOf(3, [0x00, 0x01, 0xab, 0xcd]), registry.lookup('PC', 3))).toEqual(['0: 0x0001', '1: 0xABCD']);
  });

  it('lists palette colours after the palette header', () => {
    const resource = resourceOf(10, [0, 0, 0, 0, 0, 0, 0x10, 0x20, 0x30, 0xff, 0xff, 0xff]);
    expect(renderResource(resource, registry.lookup('PC', 10))).toEqual(['0: #102030', '1: #FFFFFF']);
  });

  it('lists sprite records with signed positions', () => {
    const data = [0xff, 0xfb, 0x00, 0x0a, 0x00, 0x00, 0x12, 0x34, 0x00, 0x01, 0xff, 0xff, 0x00, 0x00, 0x00, 0x02, 0xaa];
    expect(renderResource(resourceOf(27, data), registry.lookup('PC', 27))).toEqual([
      '0: X=-5, Y=10, Image ID=0x00001234',
      '1: X=1, Y=-1, Image ID=0x00000002',
    ]);
  });

  it('lists button records', () => {
    const data = [
      0x00, 0x01, 0x00, 0x0a, 0x00, 0x14, 0x00, 0x1e, 0x00, 0x28, 0x00, 0x00, 0x00, 0x02, 0x00, 0x00, 0x00, 0x00, 0x3a, 0x0b,
      0x00, 0x02, 0x00, 0x64, 0x00, 0xc8, 0x00, 0x05, 0x00, 0x06, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x3a, 0x0c,
    ];
    expect(renderResource(resourceOf(31, data), registry.lookup('PC', 31))).toEqual([
      '0: Type=1, Left=10, Right=20, Top=30, Bottom=40, Plane=0, # Graphics=2, Unk @E=0, Graphics ID=0x00003A0B',
      '1: Type=2, Left=100, Right=200, Top=5, Bottom=6, Plane=1, # Graphics=1, Unk @E=0, Graphics ID=0x00003A0C',
    ]);
  });

  it('shows a single record field by field', () => {
    const resource = resourceOf(12, [0x00, 0x10, 0x00, 0x1f, 0x12, 0x34]);
    expect(renderResource(resource, registry.lookup('CDI', 12))).toEqual(['Start: 16', 'End: 31', 'Unk @4: 0x1234']);
  });

  it('shows array fields element by element', () => {
    const data = [0x00, 0x01, 0x00, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x10, 0x00, 0x00, 0x00, 0x11, ...new Array<number>(8).fill(0)];
    expect(renderResource(resourceOf(11, data), registry.lookup('PC', 11))).toEqual([
      '# Slots 0: 1',
      '# Slots 1: 2',
      '# Slots 2: 0',
      '# Slots 3: 0',
      'Slots ID 0: 0x00000010',
      'Slots ID 1: 0x00000011',
      'Slots ID 2: 0x00000000',
      'Slots ID 3: 0x00000000',
    ]);
  });

  it('reports a record longer than its payload', () => {
    expect(renderResource(resourceOf(12, [0x00, 0x01, 0x00]), registry.lookup('PC', 12))).toEqual([
      'Decode failed: Need 2 bytes at offset 2, only 1 available',
    ]);
  });

  it('names types that have no viewer', () => {
    expect(renderResource(resourceOf(7, [1]), registry.lookup('PC', 7))).toEqual(['No viewer for Sound resources.']);
    expect(renderResource(resourceOf(42, [1]), registry.lookup('PC', 42))).toEqual(['No viewer for type 42.']);
  });
});

describe('extraction to disk', () => {
  it('writes raw payloads and decoded pixels', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'blt-inspector-'));
    try {
      const filePath = join(directory, 'TEST.BLT');
      await writeFile(filePath, sampleContainer());

      const payloadFile = join(directory, 'payload.bin');
      const resource = await extractResource({ filePath, id: 0x0001, outputFile: payloadFile });
      expect(resource.size).toBe(40);
      expect(Array.from(await readFile(payloadFile))).toEqual(Array.from(clut7Payload));

      const pixelFile = join(directory, 'pixels.raw');
      const image = await extractImage({ filePath, id: 0x0001, outputFile: pixelFile });
      expect(image.header.width).toBe(4);
      expect(Array.from(await readFile(pixelFile))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it('propagates lookup and decode failures', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'blt-inspector-'));
    try {
      const filePath = join(directory, 'TEST.BLT');
      await writeFile(filePath, sampleContainer());
      const outputFile = join(directory, 'out.bin');

      await expect(extractResource({ filePath, id: 0x0099, outputFile })).rejects.toThrow(NotFoundError);
      await expect(extractImage({ filePath, id: 0x0002, outputFile })).rejects.toThrow(TruncatedInputError);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
