/**
 * Game and platform detection from the container's byte length.
 */
import { DEFAULT_PLATFORM, KNOWN_LIBRARY_SIZES } from './constants/platforms.js';

export const PLATFORMS = ['PC', 'CDI'] as const;

export type Platform = (typeof PLATFORMS)[number];

export interface PlatformDetection {
  /** Game name, or null when the size is not recognised. */
  readonly gameName: string | null;
  readonly platform: Platform;
}

/**
 * Maps a library file size to its game. Unknown sizes fall back to the PC platform.
 */
export function detectPlatform(fileSize: number): PlatformDetection {
  const known = KNOWN_LIBRARY_SIZES.get(fileSize);
  if (known) {
    return { gameName: known.gameName, platform: known.platform };
  }
  return { gameName: null, platform: DEFAULT_PLATFORM };
}

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

/** Case-insensitive platform name parsing; undefined when unrecognised. */
export function parsePlatform(value: string): Platform | undefined {
  const upper = value.toUpperCase();
  return isPlatform(upper) ? upper : undefined;
}
