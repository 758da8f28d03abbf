import { z } from 'zod';

/**
 * Zod schema for a single submitted record.
 *
 * - `collection` names the buffer the record lands in; any string is a key.
 * - `id` is opaque; it only appears in logs and may be empty.
 * - `properties` is open-ended and may be nested; it is flattened
 *   before serialization.
 */
export const objectSchema = z.object({
  collection: z.string(),
  id: z.string(),
  properties: z.record(z.string(), z.unknown()).default({}),
});

/** Inferred type of a validated record. */
export type ObjectInput = z.infer<typeof objectSchema>;
