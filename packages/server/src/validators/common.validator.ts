import { z } from 'zod';
import { PAGE_SIZE_DEFAULT, PAGE_SIZE_MAX, SKIP_MAX } from '@notesnest/shared';

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const skipLimitQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).max(SKIP_MAX).default(0),
  limit: z.coerce.number().int().min(1).max(PAGE_SIZE_MAX).default(PAGE_SIZE_DEFAULT),
});

/**
 * Query flag accepting `true`/`false` (and `1`/`0`), defaulting to false
 */
export const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

export const deleteQuerySchema = z.object({
  permanent: queryFlag,
});

export type IdParam = z.infer<typeof idParamSchema>;
export type SkipLimitQuery = z.infer<typeof skipLimitQuerySchema>;
