import { z } from 'zod';

// Lowercase letters, digits, '-' and '_'; 2-50 chars, no leading/trailing separator
export const CATEGORY_CODE_PATTERN = /^[a-z0-9][a-z0-9_-]{0,48}[a-z0-9]$/;

const booleanQuery = z.enum(['true', 'false']).transform(value => value === 'true');
const positiveId = z.coerce.number().int().positive().max(2147483647);

const categoryCode = z
  .string()
  .trim()
  .regex(CATEGORY_CODE_PATTERN, 'Code must be 2-50 lowercase letters, digits, "-" or "_"');

export const createCategorySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  parent_id: z.number().int().positive().nullable().optional(),
  display_order: z.number().int().min(0).nullable().optional(),
  use_display: z.boolean().optional(),
  category_code: categoryCode.nullable().optional(),
  description: z.string().nullable().optional(),
  image_url: z.string().url().max(500).nullable().optional(),
  hash_tags: z.array(z.string().trim().min(1).max(50)).nullable().optional(),
  meta_keywords: z.string().max(255).nullable().optional(),
});

// strict(): parent_id is rejected, categories cannot be moved
export const updateCategorySchema = z
  .object({
    name: z.string().trim().min(1, 'Name is required').max(100),
    display_order: z.number().int().min(0),
    use_display: z.boolean(),
    category_code: categoryCode.nullable(),
    description: z.string().nullable(),
    image_url: z.string().url().max(500).nullable(),
    hash_tags: z.array(z.string().trim().min(1).max(50)).nullable(),
    meta_keywords: z.string().max(255).nullable(),
  })
  .partial()
  .strict();

export const productCountSchema = z.object({
  delta: z.number().int().refine(delta => delta !== 0, 'Delta must not be zero'),
});

export const shopParamsSchema = z.object({
  shopId: positiveId,
});

export const categoryParamsSchema = shopParamsSchema.extend({
  categoryId: positiveId,
});

// Range is checked by the service so the client gets INVALID_DEPTH
export const depthParamsSchema = shopParamsSchema.extend({
  depth: z.coerce.number().int(),
});

export const codeParamsSchema = shopParamsSchema.extend({
  code: categoryCode,
});

export const displayQuerySchema = z.object({
  use_display: booleanQuery.optional(),
});

export const treeQuerySchema = displayQuerySchema.extend({
  parent_id: positiveId.optional(),
});

export const descendantsQuerySchema = displayQuerySchema.extend({
  include_self: booleanQuery.optional(),
});

export const searchQuerySchema = displayQuerySchema.extend({
  keyword: z.string().trim().min(1, 'Keyword is required').max(100),
  depth: z.coerce.number().int().optional(),
});

export const deleteQuerySchema = z.object({
  hard_delete: booleanQuery.optional(),
});
