import { z } from 'zod';
import { FieldTypeSchema } from './record.js';
import { DIGEST_VERSIONS, DEFAULT_DIGEST_VERSION } from '../utils/digest.js';
import { PolicyError } from '../utils/errors.js';

/**
 * Identity policy schemas
 *
 * Policies are plain immutable values passed per call. Every option has a
 * default so `{ mode: 'content-hash' }` is a complete policy. Unknown keys
 * are rejected: a misspelled option must not fall back to its default.
 */

/**
 * Which normalizations happen before hashing:
 * - nameMode 'cleaned': field names are trimmed, whitespace-collapsed and
 *   lower-cased before they enter the canonical form
 * - nameMode 'raw': names are hashed exactly as the parser produced them
 */
export const NameModeSchema = z.enum(['cleaned', 'raw']);
export type NameMode = z.infer<typeof NameModeSchema>;

export const CanonicalizationConfigSchema = z
  .object({
    nameMode: NameModeSchema.default('cleaned'),
    numberPrecision: z.number().int().min(1).max(17).default(15),
    fieldTypes: z.record(z.string(), FieldTypeSchema).default({}),
  })
  .strict()
  .default({});

export type CanonicalizationConfig = z.infer<typeof CanonicalizationConfigSchema>;

export const HashAlgorithmVersionSchema = z.enum(DIGEST_VERSIONS).default(DEFAULT_DIGEST_VERSION);

export const FieldSubsetSchema = z
  .union([
    z.literal('all'),
    z.object({ include: z.array(z.string()).min(1) }).strict(),
    z.object({ exclude: z.array(z.string()) }).strict(),
  ])
  .default('all');

export type FieldSubset = z.infer<typeof FieldSubsetSchema>;

export const SequentialPolicySchema = z.object({
  mode: z.literal('sequential'),
  start: z.number().int().min(0).default(1),
  prefix: z.string().default(''),
  datasetScoped: z.boolean().default(false),
}).strict();

export const ContentHashPolicySchema = z.object({
  mode: z.literal('content-hash'),
  fieldSubset: FieldSubsetSchema,
  datasetScoped: z.boolean().default(true),
  hashAlgorithmVersion: HashAlgorithmVersionSchema,
  canonicalization: CanonicalizationConfigSchema,
}).strict();

/**
 * Long identifier: every field plus the dataset tag, unique per physical record.
 * Short identifier: `shortFields` only, shared by records of one logical entity.
 */
export const CompositePolicySchema = z.object({
  mode: z.literal('composite'),
  shortFields: z.array(z.string()).min(1),
  shortDatasetScoped: z.boolean().default(false),
  hashAlgorithmVersion: HashAlgorithmVersionSchema,
  canonicalization: CanonicalizationConfigSchema,
}).strict();

export const IdentityPolicySchema = z.discriminatedUnion('mode', [
  SequentialPolicySchema,
  ContentHashPolicySchema,
  CompositePolicySchema,
]);

export type IdentityPolicy = z.infer<typeof IdentityPolicySchema>;
export type IdentityPolicyInput = z.input<typeof IdentityPolicySchema>;
export type SequentialPolicy = z.infer<typeof SequentialPolicySchema>;
export type ContentHashPolicy = z.infer<typeof ContentHashPolicySchema>;
export type CompositePolicy = z.infer<typeof CompositePolicySchema>;
export type PolicyKind = IdentityPolicy['mode'];

/**
 * Validate a policy and fill its defaults
 */
export function parsePolicy(input: unknown): IdentityPolicy {
  const result = IdentityPolicySchema.safeParse(input);
  if (!result.success) {
    throw new PolicyError(
      result.error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}
