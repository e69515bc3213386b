/**
 * Heuristic Priority Classifier
 * Infers a priority from keyword sets (English and Polish) without any remote call:
 * - exam with a short deadline or marked important → high
 * - urgent keywords → high
 * - low-urgency keywords → low
 * - anything else → medium
 *
 * Matching is lexical substring containment on the lowercased text.
 */

import { createSuggestion, PriorityClassifier, Suggestion } from "./types";

export interface HeuristicKeywords {
  exam: readonly string[];
  time: readonly string[];
  importance: readonly string[];
  urgent: readonly string[];
  low: readonly string[];
}

export const DEFAULT_KEYWORDS: HeuristicKeywords = {
  exam: ["egzamin", "exam"],
  time: ["jutro", "dzisiaj", "dzis", "today", "tomorrow"],
  importance: ["bardzo ważny", "bardzo wazny", "ważny", "wazny", "critical", "important"],
  urgent: ["urgent", "critical", "asap", "important", "pilne", "deadline"],
  low: ["low", "minor", "later", "opcjonalne", "później"],
};

const MAX_REASON_KEYWORDS = 3;

export const EXAM_REASON =
  "High priority: the task concerns an important exam in a short time (keywords: exam, today/tomorrow/important).";
export const DEFAULT_REASON = "Medium priority: routine task, no deadline.";

export function buildHaystack(title: string, description?: string | null): string {
  let content = title.toLowerCase();
  if (description) {
    content += " " + description.toLowerCase();
  }
  return content;
}

/** Keywords present in the haystack, in the order the list defines them. */
export function matchKeywords(haystack: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => haystack.includes(keyword));
}

function quoteKeywords(keywords: string[]): string {
  return keywords
    .slice(0, MAX_REASON_KEYWORDS)
    .map((keyword) => `'${keyword}'`)
    .join(", ");
}

export function classifyByKeywords(
  title: string,
  description?: string | null,
  keywords: HeuristicKeywords = DEFAULT_KEYWORDS,
): Suggestion {
  const content = buildHaystack(title, description);

  const isExamRelated = matchKeywords(content, keywords.exam).length > 0;
  const isTimeSensitive = matchKeywords(content, keywords.time).length > 0;
  const isMarkedImportant = matchKeywords(content, keywords.importance).length > 0;

  if (isExamRelated && (isTimeSensitive || isMarkedImportant)) {
    return createSuggestion("high", EXAM_REASON);
  }

  const urgentMatches = matchKeywords(content, keywords.urgent);
  if (urgentMatches.length > 0) {
    return createSuggestion(
      "high",
      `High priority: contains urgent keywords ${quoteKeywords(urgentMatches)}.`,
    );
  }

  const lowMatches = matchKeywords(content, keywords.low);
  if (lowMatches.length > 0) {
    return createSuggestion(
      "low",
      `Low priority: optional task that can be done later (keywords: ${quoteKeywords(lowMatches)}).`,
    );
  }

  return createSuggestion("medium", DEFAULT_REASON);
}

export class HeuristicPriorityClassifier implements PriorityClassifier {
  readonly kind = "heuristic" as const;

  constructor(private readonly keywords: HeuristicKeywords = DEFAULT_KEYWORDS) {}

  async suggest(title: string, description?: string | null): Promise<Suggestion> {
    return classifyByKeywords(title, description, this.keywords);
  }
}
