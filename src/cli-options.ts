/**
 * Argument parsers for the CLI. They throw commander's `InvalidArgumentError` so the
 * usage error names the offending option.
 */
import { InvalidArgumentError } from 'commander';
import { parsePlatform, type Platform } from './platform.js';

/** Accepts `0x1A2B` or `1A2B`, in any case, up to eight hex digits. */
export function parseResourceId(value: string): number {
  const match: RegExpExecArray | null = /^(?:0x)?([0-9a-f]{1,8})$/i.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Resource ids are hexadecimal, e.g. 0x01A2.');
  }
  return Number.parseInt(match[1], 16);
}

export function parsePlatformOption(value: string): Platform {
  const platform: Platform | undefined = parsePlatform(value);
  if (!platform) {
    throw new InvalidArgumentError('Platform must be PC or CDI.');
  }
  return platform;
}
