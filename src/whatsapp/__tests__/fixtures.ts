export interface TextMessageFixture {
  id: string;
  from?: string;
  text?: string;
  timestamp?: string;
}

/** A Cloud API webhook delivery carrying the given text messages. */
export function webhookBody(messages: TextMessageFixture[], statuses = 0): string {
  return JSON.stringify({
    object: "whatsapp_business_account",
    entry: [
      {
        id: "waba-1",
        changes: [
          {
            field: "messages",
            value: {
              messaging_product: "whatsapp",
              contacts: [{ wa_id: "15550001111", profile: { name: "Test User" } }],
              messages: messages.map((m) => ({
                from: m.from ?? "15550001111",
                id: m.id,
                timestamp: m.timestamp ?? "1700000000",
                type: "text",
                text: { body: m.text ?? "What is vitiligo?" },
              })),
              statuses: Array.from({ length: statuses }, (_, i) => ({ id: `status-${i}`, status: "delivered" })),
            },
          },
        ],
      },
    ],
  });
}
