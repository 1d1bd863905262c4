/**
 * Descriptor of a single resource, as recorded in its directory's resource table.
 */
export interface BltResourceEntry {
  /** Lookup key, unique across the whole container. */
  readonly id: number;
  /** Display label; not guaranteed unique. */
  readonly name: string;
  /** Platform-specific type code. */
  readonly type: number;
  /** Absolute byte position of the payload. */
  readonly offset: number;
  readonly size: number;
}

/**
 * Payload of a resource, freshly read from the source.
 */
export interface BltResource {
  readonly id: number;
  readonly type: number;
  readonly size: number;
  readonly data: Uint8Array;
}
