import { z } from 'zod';
import { InvalidBatchError } from '../utils/errors.js';

/**
 * Tabular batch schemas: fields, records and batches as handed over by the
 * parsing stage of a pipeline.
 */

/**
 * Declared logical type of a field
 */
export const FieldTypeSchema = z.enum(['string', 'number', 'date', 'boolean', 'categorical']);
export type FieldType = z.infer<typeof FieldTypeSchema>;

/**
 * Coded value with its code -> label table (factor columns, lookup codes)
 */
export const CategoricalValueSchema = z.object({
  code: z.union([z.string(), z.number()]),
  labels: z.record(z.string(), z.string()),
});

export type CategoricalValue = z.infer<typeof CategoricalValueSchema>;

export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.date(),
  z.null(),
  CategoricalValueSchema,
]);

export type FieldValue = z.infer<typeof FieldValueSchema>;

export const FieldSchema = z.object({
  name: z.string(),
  value: FieldValueSchema,
  type: FieldTypeSchema.optional(),
});

export type Field = z.infer<typeof FieldSchema>;

/**
 * One row. `ordinal` is the caller's explicit position marker, required only
 * for sequential identifiers.
 */
export const DataRecordSchema = z.object({
  fields: z.array(FieldSchema),
  ordinal: z.number().int().min(0).optional(),
});

export type DataRecord = z.infer<typeof DataRecordSchema>;

export const BatchOrderSchema = z.enum(['stable', 'unspecified']);
export type BatchOrder = z.infer<typeof BatchOrderSchema>;

export const BatchSchema = z.object({
  datasetTag: z.string().min(1),
  records: z.array(DataRecordSchema),
  order: BatchOrderSchema.optional(),
});

export type Batch = z.infer<typeof BatchSchema>;

/**
 * Validate an untyped batch (e.g. decoded JSON) at the library boundary
 */
export function parseBatch(input: unknown): Batch {
  const result = BatchSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidBatchError(
      result.error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}
