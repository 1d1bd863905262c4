import type { Platform } from '../platform.js';

interface KnownLibrary {
  readonly gameName: string;
  readonly platform: Platform;
}

/** Known BOLTLIB.BLT sizes and the game/platform each belongs to. */
export const KNOWN_LIBRARY_SIZES: ReadonlyMap<number, KnownLibrary> = new Map<number, KnownLibrary>([
  [11724174, { gameName: 'Labyrinth of Crete PC/Mac', platform: 'PC' }],
  [10452486, { gameName: "Merlin's Apprentice PC/Mac", platform: 'PC' }],
  [8007558, { gameName: "Merlin's Apprentice CD-I", platform: 'CDI' }],
]);

export const DEFAULT_PLATFORM: Platform = 'PC';
