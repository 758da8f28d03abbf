/**
 * Core domain types for the objects batching pipeline.
 *
 * A record is accepted per collection, flattened, serialized and held
 * by that collection's buffer until it is flushed as part of a batch.
 */

/** Free-form, possibly nested, properties attached to a record. */
export type ObjectProperties = Record<string, unknown>;

/**
 * Caller-supplied unit of work.
 *
 * `collection` groups records into one buffer; `id` is opaque and only
 * shows up in logs when the record has to be excluded from a batch.
 */
export interface ObjectRecord {
  readonly collection: string;
  readonly id: string;
  readonly properties: ObjectProperties;
}

/** Leaf values a flattened record may hold. */
export type FlatValue = string | number | boolean | null | readonly unknown[];

/** Single-level mapping from dotted property path to leaf value. */
export type NormalizedRecord = Record<string, FlatValue>;

/** JSON text of one normalized record, as held by a buffer. */
export interface SerializedItem {
  readonly json: string;
  readonly bytes: number;
}

/**
 * Unit sent over the wire.
 *
 * `objects` is the JSON array text of the buffered items, in arrival order.
 */
export interface Batch {
  readonly collection: string;
  readonly writeKey: string;
  readonly objects: string;
}
