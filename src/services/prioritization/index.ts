/**
 * Priority Suggestion Engine
 * Classifies task urgency from its title and description, by keyword heuristics
 * or an OpenAI model, with an owned in-memory cache in front of either.
 */

export { buildCacheKey, CACHE_KEY_SEPARATOR, type CacheKey } from "./cache-key";

export {
  HeuristicPriorityClassifier,
  classifyByKeywords,
  DEFAULT_KEYWORDS,
  DEFAULT_REASON,
  EXAM_REASON,
  type HeuristicKeywords,
} from "./heuristic-classifier";

export {
  OpenAIPriorityClassifier,
  parsePriorityReply,
  resolveOutcome,
  NOT_CONFIGURED_REASON,
  UNAVAILABLE_REASON,
  ANALYSIS_COMPLETED_REASON,
  type RemoteClassifierConfig,
} from "./remote-classifier";

export { SuggestionCache, type SuggestionCacheStats } from "./suggestion-cache";

export {
  PriorityService,
  createPriorityService,
  type PriorityServiceConfig,
  type PriorityCacheReport,
} from "./priority-service";

export type {
  Suggestion,
  PriorityClassifier,
  ClassifierKind,
  RemoteOutcome,
  FallbackReason,
} from "./types";
