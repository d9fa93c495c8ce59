import { z } from 'zod';

export const DEFAULT_CACHE_NAME = 'cache';

export const BoundedCacheConfigSchema = z.object({
  /** Fixed capacity; 0 is accepted and makes every insert evict itself */
  maxSize: z.number().int().nonnegative(),
  name: z.string().min(1).default(DEFAULT_CACHE_NAME),
});

export type BoundedCacheConfig = z.infer<typeof BoundedCacheConfigSchema>;
export type BoundedCacheConfigInput = z.input<typeof BoundedCacheConfigSchema>;
