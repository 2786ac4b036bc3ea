export type RagErrorCode =
  | "INGESTION_FAILED"
  | "EMPTY_DOCUMENT"
  | "DOCUMENT_UNREADABLE"
  | "INDEX_FAILED"
  | "DIMENSION_MISMATCH"
  | "INDEX_CORRUPT"
  | "INDEX_UNAVAILABLE"
  | "EMBEDDING_MODEL_MISMATCH"
  | "BACKUP_NOT_FOUND"
  | "RETRIEVAL_FAILED"
  | "EMBEDDING_SERVICE_UNAVAILABLE"
  | "GENERATION_FAILED"
  | "GENERATION_TIMEOUT"
  | "GENERATION_SERVICE_UNAVAILABLE"
  | "WEBHOOK_REJECTED"
  | "SIGNATURE_INVALID"
  | "MALFORMED_PAYLOAD"
  | "DISPATCH_FAILED";

/** Root of every error this project raises on purpose. */
export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
    this.code = code;
  }
}

// ── Ingestion ───────────────────────────────────────────────────────────────

export class IngestionError extends RagError {
  constructor(message: string, options?: { cause?: unknown; code?: RagErrorCode }) {
    super(options?.code ?? "INGESTION_FAILED", message, options);
    this.name = "IngestionError";
  }
}

export class EmptyDocumentError extends IngestionError {
  constructor(readonly sourceId: string) {
    super(`Document "${sourceId}" contains no text`, { code: "EMPTY_DOCUMENT" });
    this.name = "EmptyDocumentError";
  }
}

export class DocumentReadError extends IngestionError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Could not read PDF "${filePath}": ${describeCause(cause)}`, {
      code: "DOCUMENT_UNREADABLE",
      cause,
    });
    this.name = "DocumentReadError";
  }
}

// ── Index ───────────────────────────────────────────────────────────────────

export class IndexError extends RagError {
  constructor(message: string, options?: { cause?: unknown; code?: RagErrorCode }) {
    super(options?.code ?? "INDEX_FAILED", message, options);
    this.name = "IndexError";
  }
}

export class DimensionMismatchError extends IndexError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Embedding dimension mismatch: index=${expected} vector=${actual}`, {
      code: "DIMENSION_MISMATCH",
    });
    this.name = "DimensionMismatchError";
  }
}

export class IndexCorruptError extends IndexError {
  constructor(detail: string, cause?: unknown) {
    super(`Index is corrupt: ${detail}`, { code: "INDEX_CORRUPT", cause });
    this.name = "IndexCorruptError";
  }
}

export class IndexUnavailableError extends IndexError {
  constructor() {
    super("Index has not been loaded", { code: "INDEX_UNAVAILABLE" });
    this.name = "IndexUnavailableError";
  }
}

export class EmbeddingModelMismatchError extends IndexError {
  constructor(readonly indexModel: string, readonly currentModel: string) {
    super(
      `Embedding model mismatch: index was built with "${indexModel}", current model is "${currentModel}". Re-run ingest without --append.`,
      { code: "EMBEDDING_MODEL_MISMATCH" },
    );
    this.name = "EmbeddingModelMismatchError";
  }
}

export class BackupNotFoundError extends IndexError {
  constructor(readonly backupName: string) {
    super(`Backup "${backupName}" does not exist`, { code: "BACKUP_NOT_FOUND" });
    this.name = "BackupNotFoundError";
  }
}

// ── Retrieval ───────────────────────────────────────────────────────────────

export class RetrievalError extends RagError {
  constructor(message: string, options?: { cause?: unknown; code?: RagErrorCode }) {
    super(options?.code ?? "RETRIEVAL_FAILED", message, options);
    this.name = "RetrievalError";
  }
}

export class EmbeddingServiceError extends RetrievalError {
  constructor(message: string, readonly status?: number, cause?: unknown) {
    super(message, { code: "EMBEDDING_SERVICE_UNAVAILABLE", cause });
    this.name = "EmbeddingServiceError";
  }
}

// ── Generation ──────────────────────────────────────────────────────────────

export class GenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown; code?: RagErrorCode }) {
    super(options?.code ?? "GENERATION_FAILED", message, options);
    this.name = "GenerationError";
  }
}

export class GenerationTimeoutError extends GenerationError {
  constructor(readonly deadlineMs: number) {
    super(`Language model did not answer within ${deadlineMs}ms`, {
      code: "GENERATION_TIMEOUT",
    });
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationServiceError extends GenerationError {
  constructor(message: string, readonly status?: number, cause?: unknown) {
    super(message, { code: "GENERATION_SERVICE_UNAVAILABLE", cause });
    this.name = "GenerationServiceError";
  }
}

// ── Webhook ─────────────────────────────────────────────────────────────────

export class WebhookError extends RagError {
  constructor(message: string, options?: { cause?: unknown; code?: RagErrorCode }) {
    super(options?.code ?? "WEBHOOK_REJECTED", message, options);
    this.name = "WebhookError";
  }
}

export class SignatureInvalidError extends WebhookError {
  constructor() {
    super("Webhook signature does not match payload", { code: "SIGNATURE_INVALID" });
    this.name = "SignatureInvalidError";
  }
}

export class MalformedPayloadError extends WebhookError {
  constructor(detail: string, cause?: unknown) {
    super(`Malformed webhook payload: ${detail}`, { code: "MALFORMED_PAYLOAD", cause });
    this.name = "MalformedPayloadError";
  }
}

// ── Dispatch ────────────────────────────────────────────────────────────────

export class DispatchError extends RagError {
  constructor(
    readonly recipientId: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      "DISPATCH_FAILED",
      `Reply to ${recipientId} not delivered after ${attempts} attempt(s): ${describeCause(cause)}`,
      { cause },
    );
    this.name = "DispatchError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
