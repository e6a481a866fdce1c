import { z } from 'zod';

const booleanQuery = z.enum(['true', 'false']).transform(value => value === 'true');
const positiveId = z.coerce.number().int().positive().max(2147483647);

const content = z
  .string()
  .trim()
  .min(1, 'Content is required')
  .max(1000, 'Content must be at most 1000 characters');

const guestPassword = z.string().min(4, 'Password must be at least 4 characters').max(50);

export const createCommentSchema = z.object({
  content,
  parent_id: z.number().int().positive().nullable().optional(),
  password: guestPassword.optional(),
});

export const updateCommentSchema = z.object({
  content,
  password: guestPassword.optional(),
});

export const postParamsSchema = z.object({
  postId: positiveId,
});

export const commentParamsSchema = z.object({
  commentId: positiveId,
});

export const listQuerySchema = z.object({
  include_deleted: booleanQuery.optional(),
});

export const includeSelfQuerySchema = z.object({
  include_self: booleanQuery.optional(),
});

export const deleteQuerySchema = z.object({
  hard_delete: booleanQuery.optional(),
  password: guestPassword.optional(),
});
