import { DispatchError, RagError, SignatureInvalidError } from "../errors.js";
import { createEventLogger, createLogger, type Logger } from "../logger.js";
import type { QueryRequest, QueryResponse } from "../rag/pipeline.js";
import type { ConversationTurn } from "../rag/types.js";
import type { WhatsAppClient } from "./client.js";
import { DedupCache } from "./dedup-cache.js";
import { deliverWithRetry, type RetryPolicy } from "./dispatch.js";
import { parseWebhookPayload, type InboundMessage } from "./payload.js";
import { verifySignature } from "./signature.js";

const logger = createLogger("gateway");

export const APOLOGY_REPLY =
  "I'm sorry, I'm having trouble answering right now. Please try again in a little while.";

export interface Answerer {
  query(request: QueryRequest): Promise<QueryResponse>;
}

export interface WebhookGatewayOptions {
  answerer: Answerer;
  client: WhatsAppClient;
  appSecret: string;
  verifyToken: string;
  dedup: { windowMs: number; maxEntries: number };
  retry: RetryPolicy;
  /** Overrides the backoff sleep (tests). */
  wait?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

export type EventState = "replied" | "failed";

export interface EventOutcome {
  eventId: string;
  state: EventState;
  reply: string;
  attempts: number;
}

export interface ReceiveResult {
  accepted: string[];
  duplicates: string[];
  ignored: number;
  /** Settles once every accepted event is replied to or has failed. Never rejects. */
  processing: Promise<EventOutcome[]>;
}

/**
 * Inbound side of the WhatsApp channel. Each message moves through
 * received → verified → duplicate | fresh → processed → replied | failed.
 * `receive` returns as soon as the event is verified and deduplicated so the
 * HTTP acknowledgement does not wait on the model.
 */
export class WebhookGateway {
  private readonly dedup: DedupCache;
  private readonly inFlight = new Set<Promise<EventOutcome[]>>();

  constructor(private readonly options: WebhookGatewayOptions) {
    this.dedup = new DedupCache({
      windowMs: options.dedup.windowMs,
      maxEntries: options.dedup.maxEntries,
      ...(options.now ? { now: options.now } : {}),
    });
  }

  /** Webhook registration handshake: echo the challenge when the token matches. */
  verifyHandshake(
    mode: string | null,
    token: string | null,
    challenge: string | null,
  ): string | null {
    if (mode === "subscribe" && token === this.options.verifyToken && challenge !== null) {
      return challenge;
    }
    return null;
  }

  /**
   * Verifies and deduplicates a delivery, then starts processing the fresh
   * messages in the background. Throws SignatureInvalidError or
   * MalformedPayloadError before anything is recorded.
   */
  receive(rawPayload: Buffer | string, signature: string | undefined): ReceiveResult {
    if (!verifySignature(rawPayload, signature, this.options.appSecret)) {
      throw new SignatureInvalidError();
    }
    const text = typeof rawPayload === "string" ? rawPayload : rawPayload.toString("utf-8");
    const { messages, ignored } = parseWebhookPayload(text);

    const fresh: InboundMessage[] = [];
    const duplicates: string[] = [];
    for (const message of messages) {
      if (this.dedup.tryAdd(message.eventId)) {
        fresh.push(message);
      } else {
        duplicates.push(message.eventId);
      }
    }
    if (duplicates.length > 0) {
      logger.info({ duplicates }, "Dropped redelivered events");
    }

    const processing = Promise.all(fresh.map((message) => this.process(message)));
    this.inFlight.add(processing);
    void processing.finally(() => this.inFlight.delete(processing));

    return {
      accepted: fresh.map((m) => m.eventId),
      duplicates,
      ignored,
      processing,
    };
  }

  /** Waits for every event still being processed. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private async process(message: InboundMessage): Promise<EventOutcome> {
    const log = createEventLogger("gateway", message.eventId);
    const { client, retry, wait } = this.options;

    try {
      await client.markAsRead(message.eventId);
    } catch (err: unknown) {
      log.warn({ err }, "Could not mark message as read");
    }

    const reply = await this.answer(message.text, log);

    try {
      const attempts = await deliverWithRetry(
        () => client.sendText(message.senderId, reply, message.eventId),
        message.senderId,
        retry,
        log,
        wait,
      );
      const turn: ConversationTurn = {
        userId: message.senderId,
        messageText: message.text,
        replyText: reply,
        timestamp: new Date().toISOString(),
      };
      log.info({ turn, attempts }, "Replied");
      return { eventId: message.eventId, state: "replied", reply, attempts };
    } catch (err: unknown) {
      log.error({ err, recipientId: message.senderId }, "Reply not delivered");
      const attempts = err instanceof DispatchError ? err.attempts : 0;
      return { eventId: message.eventId, state: "failed", reply, attempts };
    }
  }

  /** Retrieval and generation failures become an apology instead of a dropped message. */
  private async answer(text: string, log: Logger): Promise<string> {
    try {
      const { answer } = await this.options.answerer.query({ question: text });
      return answer;
    } catch (err: unknown) {
      if (err instanceof RagError) {
        log.warn({ err, code: err.code }, "Query failed, sending apology");
      } else {
        log.error({ err }, "Unexpected query failure, sending apology");
      }
      return APOLOGY_REPLY;
    }
  }
}
