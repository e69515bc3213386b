import { logger } from "../../utils/logger";
import { buildCacheKey } from "./cache-key";
import { HeuristicPriorityClassifier } from "./heuristic-classifier";
import { OpenAIPriorityClassifier } from "./remote-classifier";
import { SuggestionCache, SuggestionCacheStats } from "./suggestion-cache";
import type { ClassifierKind, PriorityClassifier, Suggestion } from "./types";

export interface PriorityServiceConfig {
  openaiApiKey?: string;
  model?: string;
  timeout?: number;
}

export interface PriorityCacheReport extends SuggestionCacheStats {
  mode: ClassifierKind;
}

/**
 * Single entry point for priority suggestions. The classifier is fixed when the
 * service is built; both classifier kinds go through the same cache.
 */
export class PriorityService {
  constructor(
    private readonly classifier: PriorityClassifier,
    private readonly cache: SuggestionCache = new SuggestionCache(),
  ) {}

  get mode(): ClassifierKind {
    return this.classifier.kind;
  }

  async suggestPriority(title: string, description?: string | null): Promise<Suggestion> {
    const key = buildCacheKey(title, description);
    return this.cache.getOrCompute(key, () => this.classifier.suggest(title, description));
  }

  /** Refreshes a stored suggestion; same contract as suggestPriority. */
  async reanalyze(title: string, description?: string | null): Promise<Suggestion> {
    return this.suggestPriority(title, description);
  }

  cacheStats(): PriorityCacheReport {
    return { mode: this.mode, ...this.cache.stats() };
  }

  clearCache(): void {
    this.cache.clear();
  }
}

export function createPriorityService(config: PriorityServiceConfig = {}): PriorityService {
  const apiKey = config.openaiApiKey?.trim() ?? "";

  if (apiKey) {
    logger.info("Priority suggestions use the OpenAI classifier", {
      model: config.model,
      timeout: config.timeout,
    });
    return new PriorityService(
      new OpenAIPriorityClassifier({ apiKey, model: config.model, timeout: config.timeout }),
    );
  }

  logger.info("Priority suggestions use the keyword heuristic (no OpenAI API key)");
  return new PriorityService(new HeuristicPriorityClassifier());
}
