import { CommandError } from "./commandRunner.ts";
import { sleep } from "./utils.ts";

export const RETRY_BASE_DELAY_MS = 750;
export const RETRY_MAX_DELAY_MS = 6_000;

const RETRYABLE_HTTP_STATUS_RE = /HTTP Error (408|425|429|500|502|503|504)\b/i;

const RETRYABLE_MESSAGE_PATTERNS = [
  "timed out",
  "timeout",
  "connection reset",
  "connection aborted",
  "remote end closed connection",
  "incompleteread",
  "econnreset",
  "etimedout",
  "eai_again"
];

export type ErrorWithAttempts = Error & {
  attempts?: number;
};

export function isRetryableExtractorError(error: unknown) {
  if (error instanceof CommandError && error.timedOut) return true;

  const message =
    error instanceof CommandError
      ? `${error.stderr}\n${error.message}`
      : String(error instanceof Error ? error.message : error ?? "");
  if (RETRYABLE_HTTP_STATUS_RE.test(message)) return true;

  const lowered = message.toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => lowered.includes(pattern));
}

export function withAttemptCount(error: unknown, attempts: number): ErrorWithAttempts {
  const resolvedAttempts = Number(attempts || 1);

  if (error instanceof Error) {
    const errorWithAttempts: ErrorWithAttempts = error;
    errorWithAttempts.attempts = resolvedAttempts;
    return errorWithAttempts;
  }

  const wrapped: ErrorWithAttempts = new Error(String(error ?? "unknown error"));
  wrapped.attempts = resolvedAttempts;
  return wrapped;
}

export function readAttemptCount(error: unknown) {
  if (error && typeof error === "object" && "attempts" in error && typeof error.attempts === "number") {
    return error.attempts;
  }
  return 1;
}

export function getRetryDelayMs(attempt: number, baseDelayMs = RETRY_BASE_DELAY_MS, maxDelayMs = RETRY_MAX_DELAY_MS) {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

type RunWithRetriesOptions<T> = {
  attempts: number;
  run: (attempt: number) => Promise<T>;
  shouldRetry?: (error: unknown) => boolean;
  baseDelayMs?: number;
  maxDelayMs?: number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  wait?: (ms: number) => Promise<void>;
};

export async function runWithRetries<T>({
  attempts,
  run,
  shouldRetry = isRetryableExtractorError,
  baseDelayMs = RETRY_BASE_DELAY_MS,
  maxDelayMs = RETRY_MAX_DELAY_MS,
  onRetry,
  wait = sleep
}: RunWithRetriesOptions<T>): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(attempts) || 1);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await run(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw withAttemptCount(error, attempt);
      }
      const delayMs = getRetryDelayMs(attempt, baseDelayMs, maxDelayMs);
      onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
