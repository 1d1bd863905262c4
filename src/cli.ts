#!/usr/bin/env node
/**
 * BLT Inspector - CLI Interface
 *
 * Command-line interface for browsing BLT resource containers and decoding their images.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { BltContainer } from './blt-container.js';
import { parsePlatformOption, parseResourceId } from './cli-options.js';
import { formatResourceId } from './errors.js';
import { buildListing, extractImage, extractResource, formatListing, renderResource, resolvePlatform } from './inspector.js';
import type { Platform } from './platform.js';
import { loadResourceTypeRegistry } from './resource-types.js';
import { formatHexDump } from './views.js';

const program = new Command();

const version = '0.1.0';

function fail(action: string, error: unknown): never {
  console.error(`❌ ${action} failed:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

program
  .name('blt-inspector')
  .description('Browse BLT resource containers and decode CLUT7/RL7 images')
  .version(version);

program
  .command('list')
  .description('List the directories and resources of a BLT file')
  .argument('<file>', 'Path to the BLT file')
  .option('--platform <platform>', 'Override platform detection (PC or CDI)', parsePlatformOption)
  .option('--json', 'Print the listing as JSON')
  .action(async (file: string, options: { platform?: Platform; json?: boolean }) => {
    try {
      const container = await BltContainer.read({ filePath: resolve(file) });
      const listing = buildListing(container, loadResourceTypeRegistry(), options.platform);
      if (options.json) {
        console.log(JSON.stringify(listing, null, 2));
        return;
      }
      for (const line of formatListing(listing)) {
        console.log(line);
      }
    } catch (error) {
      fail('List', error);
    }
  });

program
  .command('show')
  .description('Show the typed view and hex dump of one resource')
  .argument('<file>', 'Path to the BLT file')
  .argument('<id>', 'Resource id in hex', parseResourceId)
  .option('--platform <platform>', 'Override platform detection (PC or CDI)', parsePlatformOption)
  .action(async (file: string, id: number, options: { platform?: Platform }) => {
    try {
      const container = await BltContainer.read({ filePath: resolve(file) });
      const { platform } = resolvePlatform(container, options.platform);
      const registry = loadResourceTypeRegistry();
      console.log(`Opening res id ${formatResourceId(id)}...`);
      const resource = container.loadResource(id);

      console.log(`Type: ${registry.describeType(platform, resource.type)}`);
      console.log(`Size: ${resource.size}`);
      console.log('');
      for (const line of renderResource(resource, registry.lookup(platform, resource.type))) {
        console.log(line);
      }
      console.log('');
      for (const line of formatHexDump(resource.data)) {
        console.log(line);
      }
    } catch (error) {
      fail('Show', error);
    }
  });

program
  .command('extract')
  .description('Write the raw payload of one resource to a file')
  .argument('<file>', 'Path to the BLT file')
  .argument('<id>', 'Resource id in hex', parseResourceId)
  .requiredOption('--out <file>', 'Where the payload will be written')
  .action(async (file: string, id: number, options: { out: string }) => {
    try {
      const resource = await extractResource({ filePath: resolve(file), id, outputFile: resolve(options.out) });
      console.log(`✅ Wrote ${resource.size} bytes of ${formatResourceId(id)} to ${options.out}`);
    } catch (error) {
      fail('Extract', error);
    }
  });

program
  .command('image')
  .description('Decode an image resource and write its raw palette indices to a file')
  .argument('<file>', 'Path to the BLT file')
  .argument('<id>', 'Resource id in hex', parseResourceId)
  .requiredOption('--out <file>', 'Where the pixel buffer will be written')
  .action(async (file: string, id: number, options: { out: string }) => {
    try {
      const image = await extractImage({ filePath: resolve(file), id, outputFile: resolve(options.out) });
      console.log(`✅ Wrote ${image.header.width}x${image.header.height} pixels of ${formatResourceId(id)} to ${options.out}`);
    } catch (error) {
      fail('Image decode', error);
    }
  });

await program.parseAsync();
