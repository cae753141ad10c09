import { z } from 'zod';
import { DIGEST_VERSIONS } from '../utils/digest.js';

/**
 * Assignment output schemas. Results are plain data so the calling pipeline
 * can persist them and validate them again on the way back in.
 */

const HexIdSchema = z.string().regex(/^[a-f0-9]+$/);

export const SequentialIdentifierSchema = z.object({
  kind: z.literal('sequential'),
  recordIndex: z.number().int().min(0),
  id: z.string().min(1),
  ordinal: z.number().int().min(0),
});

export type SequentialIdentifier = z.infer<typeof SequentialIdentifierSchema>;

export const ContentHashIdentifierSchema = z.object({
  kind: z.literal('content-hash'),
  recordIndex: z.number().int().min(0),
  id: HexIdSchema,
  algorithm: z.enum(DIGEST_VERSIONS),
  canonicalByteLength: z.number().int().min(1),
});

export type ContentHashIdentifier = z.infer<typeof ContentHashIdentifierSchema>;

export const HashedIdSchema = z.object({
  id: HexIdSchema,
  canonicalByteLength: z.number().int().min(1),
});

export type HashedId = z.infer<typeof HashedIdSchema>;

export const CompositeIdentifierSchema = z.object({
  kind: z.literal('composite'),
  recordIndex: z.number().int().min(0),
  algorithm: z.enum(DIGEST_VERSIONS),
  long: HashedIdSchema,
  short: HashedIdSchema,
});

export type CompositeIdentifier = z.infer<typeof CompositeIdentifierSchema>;

export const IdentifierSchema = z.discriminatedUnion('kind', [
  SequentialIdentifierSchema,
  ContentHashIdentifierSchema,
  CompositeIdentifierSchema,
]);

export type Identifier = z.infer<typeof IdentifierSchema>;

/**
 * Records whose long identifiers coincide. A warning, not an error: the same
 * real-world row can legitimately arrive twice in one batch.
 */
export const DuplicateLongIdentifierSchema = z.object({
  code: z.literal('DuplicateLongIdentifier'),
  id: z.string(),
  recordIndices: z.array(z.number().int().min(0)).min(2),
});

export type DuplicateLongIdentifier = z.infer<typeof DuplicateLongIdentifierSchema>;

export const CollisionReportSchema = z.object({
  duplicateLongIdentifiers: z.array(DuplicateLongIdentifierSchema),
  distinctShortIdentifiers: z.number().int().min(0).optional(),
});

export type CollisionReport = z.infer<typeof CollisionReportSchema>;

/**
 * The identifier a record is known by: the long one for composite results
 */
export function primaryId(identifier: Identifier): string {
  return identifier.kind === 'composite' ? identifier.long.id : identifier.id;
}
