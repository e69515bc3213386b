/**
 * Remote Priority Classifier
 * Asks an OpenAI chat model for a priority and a reason in a fixed two-line format.
 * Every failure, including a missing API key and a timeout, resolves to a
 * medium-priority fallback; nothing is thrown to the caller.
 */

import OpenAI from "openai";
import { isPriority, Priority } from "../../models/task.model";
import { logger, toError } from "../../utils/logger";
import {
  createSuggestion,
  FallbackReason,
  PriorityClassifier,
  RemoteOutcome,
  Suggestion,
} from "./types";

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_TIMEOUT_MS = 5000;
const MAX_TOKENS = 150;
const TEMPERATURE = 0.3;

export const NOT_CONFIGURED_REASON = "Priority service not configured, default priority used";
export const UNAVAILABLE_REASON = "Priority service unavailable, default priority used";
export const ANALYSIS_COMPLETED_REASON = "AI analysis completed";

const FALLBACK_REASONS: Record<FallbackReason, string> = {
  not_configured: NOT_CONFIGURED_REASON,
  unavailable: UNAVAILABLE_REASON,
};

const SYSTEM_PROMPT =
  "You are a task prioritization assistant. Analyze tasks and suggest priority " +
  "(low, medium, high) with a clear, natural language explanation. " +
  "Your explanation should mention specific keywords, factors, or context that influenced " +
  "the decision. Examples: 'High priority: the task contains the keywords 'urgent' and " +
  "'deadline' and is tied to a due date' or 'Medium priority: the task concerns everyday " +
  "duties without a set deadline'.";

export interface RemoteClassifierConfig {
  apiKey: string;
  model?: string;
  timeout?: number;
}

export class PriorityTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Priority request timed out after ${timeoutMs}ms`);
    this.name = "PriorityTimeoutError";
    Object.setPrototypeOf(this, PriorityTimeoutError.prototype);
  }
}

export function buildUserPrompt(title: string, description?: string | null): string {
  let content = `Title: ${title}`;
  if (description) {
    content += `\nDescription: ${description}`;
  }

  return (
    `${content}\n\n` +
    "Suggest priority and reason in format:\n" +
    "PRIORITY: <low|medium|high>\n" +
    "REASON: <natural language explanation mentioning key factors, keywords, or context>"
  );
}

/**
 * Reads the first PRIORITY: and the first REASON: line of a reply. Each field
 * falls back on its own: an unknown level gives medium, a missing reason gives
 * a generic placeholder.
 */
export function parsePriorityReply(reply: string): Suggestion {
  let priority: Priority | undefined;
  let reason: string | undefined;

  for (const rawLine of reply.split("\n")) {
    const line = rawLine.trim();

    if (priority === undefined && line.startsWith("PRIORITY:")) {
      const value = line.slice("PRIORITY:".length).trim().toLowerCase();
      priority = isPriority(value) ? value : "medium";
    } else if (reason === undefined && line.startsWith("REASON:")) {
      const value = line.slice("REASON:".length).trim();
      if (value) {
        reason = value;
      }
    }
  }

  return createSuggestion(priority ?? "medium", reason ?? ANALYSIS_COMPLETED_REASON);
}

export function resolveOutcome(outcome: RemoteOutcome): Suggestion {
  if (outcome.status === "ok") {
    return outcome.suggestion;
  }
  return createSuggestion("medium", FALLBACK_REASONS[outcome.reason]);
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PriorityTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class OpenAIPriorityClassifier implements PriorityClassifier {
  readonly kind = "remote" as const;
  private client: OpenAI | null = null;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeout: number;

  constructor(config: RemoteClassifierConfig) {
    this.apiKey = config.apiKey.trim();
    this.model = config.model || DEFAULT_MODEL;
    this.timeout = config.timeout || DEFAULT_TIMEOUT_MS;
  }

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async suggest(title: string, description?: string | null): Promise<Suggestion> {
    const outcome = await this.request(title, description);

    if (outcome.status === "fallback") {
      logger.warn("Priority suggestion fell back to default", {
        reason: outcome.reason,
        error: outcome.error?.message,
      });
    }

    return resolveOutcome(outcome);
  }

  async request(title: string, description?: string | null): Promise<RemoteOutcome> {
    if (!this.isConfigured) {
      return { status: "fallback", reason: "not_configured" };
    }

    try {
      const client = this.getClient();
      const completion = client.chat.completions.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: TEMPERATURE,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(title, description) },
          ],
        },
        { timeout: this.timeout, maxRetries: 0 },
      );

      const response = await withTimeout(completion, this.timeout);
      const choice = response.choices[0];
      if (!choice) {
        return {
          status: "fallback",
          reason: "unavailable",
          error: new Error("No choices in OpenAI response"),
        };
      }

      return { status: "ok", suggestion: parsePriorityReply(choice.message.content ?? "") };
    } catch (error) {
      return { status: "fallback", reason: "unavailable", error: toError(error) };
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey, timeout: this.timeout, maxRetries: 0 });
    }
    return this.client;
  }
}
