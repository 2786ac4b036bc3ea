import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { z } from "zod";
import { MalformedPayloadError, RagError, SignatureInvalidError } from "./errors.js";
import { createLogger } from "./logger.js";
import { RESPONSE_STYLE_NAMES } from "./rag/config.js";
import type { HealthReport, QueryRequest, QueryResponse } from "./rag/pipeline.js";
import { APOLOGY_REPLY, type WebhookGateway } from "./whatsapp/gateway.js";

const logger = createLogger("server");

const MAX_BODY_BYTES = 1024 * 1024;

const queryBodySchema = z.object({
  question: z.string().trim().min(1),
  k: z.number().int().positive().optional(),
  style: z.enum(RESPONSE_STYLE_NAMES).optional(),
});

export interface QueryService {
  query(request: QueryRequest): Promise<QueryResponse>;
  health(): Promise<HealthReport>;
}

export interface ServerDeps {
  pipeline: QueryService;
  /** Null when WhatsApp is not configured; the webhook routes then answer 404. */
  gateway: WebhookGateway | null;
}

class PayloadTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new PayloadTooLargeError();
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "Content-Type": "text/plain", "Content-Length": Buffer.byteLength(body) });
  res.end(body);
}

async function handleWebhookVerify(url: URL, gateway: WebhookGateway, res: ServerResponse): Promise<void> {
  const challenge = gateway.verifyHandshake(
    url.searchParams.get("hub.mode"),
    url.searchParams.get("hub.verify_token"),
    url.searchParams.get("hub.challenge"),
  );
  if (challenge === null) {
    logger.warn("Webhook verification failed");
    sendText(res, 403, "Verification failed");
    return;
  }
  logger.info("Webhook verified");
  sendText(res, 200, challenge);
}

async function handleWebhookEvent(
  req: IncomingMessage,
  gateway: WebhookGateway,
  res: ServerResponse,
): Promise<void> {
  const body = await readBody(req);
  const signatureHeader = req.headers["x-hub-signature-256"];
  const signature = Array.isArray(signatureHeader) ? signatureHeader[0] : signatureHeader;

  try {
    const result = gateway.receive(body, signature);
    sendJson(res, 200, {
      status: "ok",
      accepted: result.accepted.length,
      duplicates: result.duplicates.length,
      ignored: result.ignored,
    });
  } catch (err: unknown) {
    if (err instanceof SignatureInvalidError) {
      logger.warn("Rejected webhook with invalid signature");
      sendJson(res, 401, { error: err.code });
      return;
    }
    if (err instanceof MalformedPayloadError) {
      logger.warn({ err }, "Rejected malformed webhook");
      sendJson(res, 400, { error: err.code, message: err.message });
      return;
    }
    throw err;
  }
}

async function handleQuery(req: IncomingMessage, pipeline: QueryService, res: ServerResponse): Promise<void> {
  const body = await readBody(req);
  let json: unknown;
  try {
    json = JSON.parse(body.toString("utf-8"));
  } catch {
    sendJson(res, 400, { error: "INVALID_JSON" });
    return;
  }
  const parsed = queryBodySchema.safeParse(json);
  if (!parsed.success) {
    sendJson(res, 400, { error: "INVALID_REQUEST", issues: parsed.error.issues.map((i) => i.message) });
    return;
  }

  try {
    const response = await pipeline.query(parsed.data);
    sendJson(res, 200, response);
  } catch (err: unknown) {
    if (!(err instanceof RagError)) throw err;
    logger.warn({ err, code: err.code }, "Query failed");
    sendJson(res, 503, { error: err.code, answer: APOLOGY_REPLY, sources: [] });
  }
}

async function route(req: IncomingMessage, res: ServerResponse, deps: ServerDeps): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const key = `${req.method ?? "GET"} ${url.pathname}`;

  switch (key) {
    case "GET /webhook":
      if (!deps.gateway) break;
      return handleWebhookVerify(url, deps.gateway, res);
    case "POST /webhook":
      if (!deps.gateway) break;
      return handleWebhookEvent(req, deps.gateway, res);
    case "POST /query":
      return handleQuery(req, deps.pipeline, res);
    case "GET /health": {
      const report = await deps.pipeline.health();
      sendJson(res, report.status === "ok" ? 200 : 503, report);
      return;
    }
  }
  sendJson(res, 404, { error: "NOT_FOUND" });
}

export function createRequestHandler(deps: ServerDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    route(req, res, deps).catch((err: unknown) => {
      if (err instanceof PayloadTooLargeError) {
        sendJson(res, 413, { error: "PAYLOAD_TOO_LARGE" });
        return;
      }
      logger.error({ err, method: req.method, url: req.url }, "Unhandled request error");
      if (!res.headersSent) sendJson(res, 500, { error: "INTERNAL_ERROR" });
      else res.end();
    });
  };
}

export function createAppServer(deps: ServerDeps): Server {
  return createServer(createRequestHandler(deps));
}
