import { setTimeout as sleep } from "node:timers/promises";
import { DispatchError } from "../errors.js";
import type { Logger } from "../logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the second attempt; doubles for every attempt after that. */
  baseDelayMs: number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Runs `send` until it succeeds or `policy.maxAttempts` is used up, waiting
 * with exponential backoff in between. Resolves with the attempt that
 * succeeded; rejects with DispatchError carrying the last failure.
 */
export async function deliverWithRetry(
  send: () => Promise<void>,
  recipientId: string,
  policy: RetryPolicy,
  log: Logger,
  wait: (ms: number) => Promise<unknown> = sleep,
): Promise<number> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (attempt > 1) {
      await wait(backoffDelay(policy, attempt - 1));
    }
    try {
      await send();
      return attempt;
    } catch (err: unknown) {
      lastError = err;
      log.warn({ err, attempt, maxAttempts: policy.maxAttempts }, "Reply dispatch failed");
    }
  }
  throw new DispatchError(recipientId, policy.maxAttempts, lastError);
}
