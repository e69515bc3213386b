import { logger } from "../../utils/logger";
import type { CacheKey } from "./cache-key";
import type { Suggestion } from "./types";

export interface SuggestionCacheStats {
  size: number;
  inFlight: number;
  hits: number;
  misses: number;
}

/**
 * In-memory memo of suggestions, owned by the priority service that creates it.
 *
 * Unbounded and never evicted: entries live as long as the owner. Fallback
 * results are stored like any other, so a failed remote call stays cached
 * until clear() is called. A computation started before clear() never writes
 * into the cleared store.
 */
export class SuggestionCache {
  private store = new Map<CacheKey, Suggestion>();
  private inFlight = new Map<CacheKey, Promise<Suggestion>>();
  private hits = 0;
  private misses = 0;
  private generation = 0;

  get(key: CacheKey): Suggestion | undefined {
    return this.store.get(key);
  }

  set(key: CacheKey, suggestion: Suggestion): void {
    this.store.set(key, suggestion);
  }

  has(key: CacheKey): boolean {
    return this.store.has(key);
  }

  /**
   * Concurrent misses on the same key share one computation; the in-flight
   * entry is dropped once it settles.
   */
  async getOrCompute(key: CacheKey, compute: () => Promise<Suggestion>): Promise<Suggestion> {
    const cached = this.store.get(key);
    if (cached) {
      this.hits++;
      logger.debug("Suggestion cache hit", { key });
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      logger.debug("Suggestion cache joined in-flight computation", { key });
      return pending;
    }

    this.misses++;
    logger.debug("Suggestion cache miss", { key });

    const generation = this.generation;
    const computation: Promise<Suggestion> = compute()
      .then((suggestion) => {
        if (generation === this.generation) {
          this.store.set(key, suggestion);
        }
        return suggestion;
      })
      .finally(() => {
        if (this.inFlight.get(key) === computation) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, computation);
    return computation;
  }

  clear(): void {
    this.generation++;
    this.store.clear();
    this.inFlight.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.store.size;
  }

  stats(): SuggestionCacheStats {
    return {
      size: this.store.size,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
