import { z } from "zod";
import { GenerationServiceError, describeCause } from "../errors.js";

const streamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullish(),
        })
        .optional(),
    }),
  ),
});

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

export interface LanguageModel {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface ChatCompletionClientOptions {
  baseUrl: string;
  model: string;
  apiKey?: string | undefined;
}

/**
 * Streams a chat completion from an OpenAI-compatible endpoint (a local
 * Ollama or llama.cpp server) and returns the concatenated content.
 */
export class ChatCompletionClient implements LanguageModel {
  readonly model: string;

  constructor(private readonly options: ChatCompletionClientOptions) {
    this.model = options.model;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers["Authorization"] = `Bearer ${this.options.apiKey}`;
    return headers;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let res: Response;
    try {
      res = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: "user", content: request.prompt }],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
        }),
        signal: request.signal,
      });
    } catch (err: unknown) {
      if (request.signal.aborted) throw err;
      throw new GenerationServiceError(
        `Language model unreachable: ${describeCause(err)}`,
        undefined,
        err,
      );
    }

    if (!res.ok) {
      const text = await res.text();
      throw new GenerationServiceError(`Language model error (${res.status}): ${text}`, res.status);
    }

    const body = res.body;
    if (!body) throw new GenerationServiceError("Language model returned no response body");

    const reader = body.getReader();
    const decoder = new TextDecoder();
    let fullReply = "";
    let buffer = "";

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed || !trimmed.startsWith("data: ")) continue;
        const payload = trimmed.slice(6);
        if (payload === "[DONE]") continue;

        let json: unknown;
        try {
          json = JSON.parse(payload);
        } catch {
          continue; // skip malformed chunks
        }
        const chunk = streamChunkSchema.safeParse(json);
        if (!chunk.success) continue;

        // Reasoning deltas are the model thinking out loud; only content is the reply
        const content = chunk.data.choices[0]?.delta?.content;
        if (content) fullReply += content;
      }
    }

    return fullReply;
  }

  /** True when the server lists its models. */
  async ping(): Promise<boolean> {
    try {
      const res = await fetch(`${this.options.baseUrl}/models`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
