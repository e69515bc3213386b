import type { Priority } from "../../models/task.model";

export interface Suggestion {
  readonly priority: Priority;
  readonly reason: string;
}

/**
 * Suggests a priority for a task's title and optional description. The
 * returned promise always resolves; a classifier that cannot reach its model
 * resolves with a medium fallback suggestion instead of rejecting.
 */
export interface PriorityClassifier {
  readonly kind: ClassifierKind;
  suggest(title: string, description?: string | null): Promise<Suggestion>;
}

export type ClassifierKind = "heuristic" | "remote";

export type FallbackReason = "not_configured" | "unavailable";

export type RemoteOutcome =
  | { status: "ok"; suggestion: Suggestion }
  | { status: "fallback"; reason: FallbackReason; error?: Error };

export function createSuggestion(priority: Priority, reason: string): Suggestion {
  return Object.freeze({ priority, reason });
}
