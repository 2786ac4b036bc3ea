import { createHmac, timingSafeEqual } from "node:crypto";

const SIGNATURE_PREFIX = "sha256=";

/** The `X-Hub-Signature-256` header value Meta sends for `rawPayload`. */
export function signPayload(rawPayload: string | Buffer, secret: string): string {
  const digest = createHmac("sha256", secret).update(rawPayload).digest("hex");
  return `${SIGNATURE_PREFIX}${digest}`;
}

/**
 * Recomputes the HMAC over the exact bytes received and compares it with the
 * header in constant time.
 */
export function verifySignature(
  rawPayload: string | Buffer,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature || !signature.startsWith(SIGNATURE_PREFIX)) return false;

  const expected = Buffer.from(signPayload(rawPayload, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}
