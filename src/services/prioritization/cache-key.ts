export type CacheKey = string;

export const CACHE_KEY_SEPARATOR = "|";

/**
 * Inputs that differ only by case or surrounding whitespace share a key.
 * An absent description keys the same as an empty one.
 */
export function buildCacheKey(title: string, description?: string | null): CacheKey {
  const normalizedTitle = title.trim().toLowerCase();
  const normalizedDescription = (description ?? "").trim().toLowerCase();
  return `${normalizedTitle}${CACHE_KEY_SEPARATOR}${normalizedDescription}`;
}
