import {
  GenerationError,
  GenerationServiceError,
  GenerationTimeoutError,
  describeCause,
} from "../errors.js";
import { createLogger } from "../logger.js";
import { RESPONSE_STYLES, type ResponseStyle } from "./config.js";
import { buildFallbackPrompt, buildPrompt } from "./context-builder.js";
import type { LanguageModel } from "./llm-client.js";
import type { RetrievalResult } from "./types.js";

const logger = createLogger("generator");

const DISCLAIMER_PATTERNS = [
  /^(?:based on|according to|as per) (?:the\s+)?(?:context|documents?|excerpts?|information|provided information|available information)[:,]?\s*/i,
  /^from (?:the\s+)?context(?: i have)?[:,]?\s*/i,
];

/** Drops a leading "Based on the context," style preamble and re-capitalises. */
export function stripDisclaimers(text: string): string {
  let result = text.trimStart();
  for (const pattern of DISCLAIMER_PATTERNS) {
    const stripped = result.replace(pattern, "");
    if (stripped !== result) {
      result = stripped.charAt(0).toUpperCase() + stripped.slice(1);
    }
  }
  return result;
}

/**
 * Cuts `text` to at most `maxChars`, preferring the end of the last complete
 * sentence that fits. Sentence ends are found in the whole text, so a decimal
 * point sitting at the cut is not one. Falls back to cutting at the last word
 * boundary with an ellipsis.
 */
export function truncateReply(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  let lastEnd = -1;
  for (const match of text.matchAll(/[.!?](?=\s|$)/g)) {
    const end = (match.index ?? 0) + 1;
    if (end > maxChars) break;
    lastEnd = end;
  }
  if (lastEnd > 0) return text.slice(0, lastEnd).trimEnd();

  const head = text.slice(0, Math.max(0, maxChars - 1));
  const lastBreak = head.search(/\s\S*$/);
  return `${(lastBreak > 0 ? head.slice(0, lastBreak) : head).trimEnd()}…`;
}

export function postProcess(raw: string, maxChars: number): string {
  return truncateReply(stripDisclaimers(raw).trim(), maxChars);
}

export interface GeneratorOptions {
  model: LanguageModel;
  deadlineMs: number;
  maxTokens: number;
  maxReplyChars: number;
}

/** Stateless; safe to share between concurrent requests. */
export class Generator {
  constructor(private readonly options: GeneratorOptions) {}

  /**
   * Without a `style` the configured token and length caps apply and the prompt
   * asks for a moderate answer. A style brings its own caps.
   */
  async answer(
    question: string,
    context: RetrievalResult,
    temperature: number,
    style?: ResponseStyle,
  ): Promise<string> {
    const limits = style ? RESPONSE_STYLES[style] : this.options;
    const prompt =
      context.length > 0 ? buildPrompt(question, context, style) : buildFallbackPrompt(question);
    const raw = await this.complete(prompt, temperature, limits.maxTokens);
    const reply = postProcess(raw, limits.maxReplyChars);
    if (!reply) {
      throw new GenerationServiceError("Language model returned an empty reply");
    }
    return reply;
  }

  /**
   * Races the model call against the deadline. The timer settles the race even
   * when the model ignores the abort signal.
   */
  private async complete(prompt: string, temperature: number, maxTokens: number): Promise<string> {
    const { model, deadlineMs } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationTimeoutError(deadlineMs));
      }, deadlineMs);
    });

    const started = performance.now();
    try {
      return await Promise.race([
        model.complete({ prompt, temperature, maxTokens, signal: controller.signal }),
        deadline,
      ]);
    } catch (err: unknown) {
      if (err instanceof GenerationError) throw err;
      if (controller.signal.aborted) throw new GenerationTimeoutError(deadlineMs);
      throw new GenerationServiceError(`Language model call failed: ${describeCause(err)}`, undefined, err);
    } finally {
      clearTimeout(timer);
      logger.debug({ model: model.model, ms: Math.round(performance.now() - started) }, "Model call finished");
    }
  }
}
