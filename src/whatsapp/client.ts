import type { WhatsAppSettings } from "../config.js";
import { createLogger } from "../logger.js";

const logger = createLogger("whatsapp");

export interface WhatsAppClient {
  sendText(to: string, text: string, replyToMessageId?: string): Promise<void>;
  markAsRead(messageId: string): Promise<void>;
}

export class WhatsAppApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "WhatsAppApiError";
  }
}

/** WhatsApp Cloud API client (Meta Graph API). */
export class CloudApiClient implements WhatsAppClient {
  private readonly url: string;

  constructor(private readonly settings: WhatsAppSettings) {
    this.url = `https://graph.facebook.com/${settings.apiVersion}/${settings.phoneNumberId}/messages`;
  }

  private async post(body: Record<string, unknown>, timeoutMs: number): Promise<void> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.settings.accessToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ messaging_product: "whatsapp", ...body }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new WhatsAppApiError(`WhatsApp API unreachable: ${reason}`, null);
    }

    if (!res.ok) {
      const errorText = await res.text();
      throw new WhatsAppApiError(`WhatsApp API error (${res.status}): ${errorText}`, res.status);
    }
  }

  async sendText(to: string, text: string, replyToMessageId?: string): Promise<void> {
    await this.post(
      {
        recipient_type: "individual",
        to,
        type: "text",
        text: { preview_url: false, body: text },
        ...(replyToMessageId ? { context: { message_id: replyToMessageId } } : {}),
      },
      30_000,
    );
    logger.debug({ to }, "Message sent");
  }

  async markAsRead(messageId: string): Promise<void> {
    await this.post({ status: "read", message_id: messageId }, 10_000);
  }
}
