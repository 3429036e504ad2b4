/**
 * Zod schemas for validating mapping catalogs
 */

import { z } from 'zod';

/**
 * Field mapping entry. `attributeType` is any string: unknown tags degrade
 * to text columns instead of failing validation.
 */
export const fieldMappingSchema = z
  .object({
    sourceAttribute: z.string().min(1),
    targetAttribute: z.string().min(1),
    attributeType: z.string().default('text'),
    label: z.string().default(''),
    description: z.string().default(''),
  })
  .strict();

/** Indirect lookup column */
export const lookupColumnSchema = z
  .object({
    column: z.string().min(1),
    label: z.string().default(''),
    description: z.string().default(''),
    targetEntity: z.string().min(1),
    targetField: z.string().min(1),
  })
  .strict();

/** One external entity: table metadata plus its field mappings */
export const entityMappingSchema = z
  .object({
    name: z.string().min(1),
    labelSingular: z.string().min(1),
    labelPlural: z.string().min(1),
    description: z.string().default(''),
    lookup: lookupColumnSchema,
    fieldMappings: z.array(fieldMappingSchema),
  })
  .strict();
