/**
 * Parsed layout of a BLT container.
 */
import type { BltResourceEntry } from './blt-resource.js';

export interface BltDirectory {
  readonly name: string;
  /** Absolute offset of this directory's resource table. */
  readonly tableOffset: number;
  /** Resources in file order. */
  readonly resources: readonly BltResourceEntry[];
}

export interface BltHeader {
  readonly directoryCount: number;
  /** File size recorded in the header; may disagree with the real length. */
  readonly recordedSize: number;
}
