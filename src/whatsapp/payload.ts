import { z } from "zod";
import { MalformedPayloadError } from "../errors.js";

// Only the fields we read; Meta adds new ones without notice
const messageSchema = z.object({
  from: z.string().min(1),
  id: z.string().min(1),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
});

const webhookSchema = z.object({
  object: z.string().optional(),
  entry: z.array(
    z.object({
      id: z.string().optional(),
      changes: z.array(
        z.object({
          field: z.string().optional(),
          value: z.object({
            contacts: z
              .array(
                z.object({
                  wa_id: z.string().optional(),
                  profile: z.object({ name: z.string().optional() }).optional(),
                }),
              )
              .optional(),
            messages: z.array(messageSchema).optional(),
            statuses: z.array(z.unknown()).optional(),
          }),
        }),
      ),
    }),
  ),
});

export interface InboundMessage {
  /** Provider-assigned message id (`wamid...`), used as the dedup key. */
  eventId: string;
  senderId: string;
  senderName: string | null;
  text: string;
  timestamp: number;
}

export interface ParsedWebhook {
  messages: InboundMessage[];
  /** Status callbacks and non-text messages. */
  ignored: number;
}

export function parseWebhookPayload(rawPayload: string): ParsedWebhook {
  let json: unknown;
  try {
    json = JSON.parse(rawPayload);
  } catch (err: unknown) {
    throw new MalformedPayloadError("body is not valid JSON", err);
  }

  const parsed = webhookSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedPayloadError(
      issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "unexpected shape",
    );
  }

  const messages: InboundMessage[] = [];
  let ignored = 0;

  for (const entry of parsed.data.entry) {
    for (const change of entry.changes) {
      const { value } = change;
      ignored += value.statuses?.length ?? 0;

      for (const message of value.messages ?? []) {
        const body = message.text?.body.trim();
        if (message.type !== "text" || !body) {
          ignored++;
          continue;
        }
        const contact = value.contacts?.find((c) => c.wa_id === message.from) ?? value.contacts?.[0];
        const seconds = Number(message.timestamp);
        messages.push({
          eventId: message.id,
          senderId: message.from,
          senderName: contact?.profile?.name ?? null,
          text: body,
          timestamp: Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : Date.now(),
        });
      }
    }
  }

  return { messages, ignored };
}
