import { ConfigError } from '../errors';
import { BoundedCacheConfigSchema, type BoundedCacheConfig } from './schema';

/**
 * Validates raw cache configuration and applies defaults.
 *
 * @throws ConfigError listing every issue, one `- path: message` line each
 */
export function parseCacheConfig(input: unknown): BoundedCacheConfig {
  const result = BoundedCacheConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid cache configuration:\n${issues}`);
  }

  return result.data;
}
