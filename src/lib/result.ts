export type ErrorKind =
  | "network"
  | "timeout"
  | "http"
  | "parse"
  | "not_found"
  | "invalid"
  | "backend"
  | "missing_element"
  | "unconfigured";

export interface AttendError {
  kind: ErrorKind;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: AttendError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify a thrown value from fetch / puppeteer into an error kind.
 * AbortSignal.timeout() rejects with a DOMException named "TimeoutError",
 * puppeteer throws its own TimeoutError class.
 */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") return "timeout";
    if (/timeout|timed out/i.test(err.message)) return "timeout";
    if (/ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|socket|fetch failed|net::/i.test(err.message)) {
      return "network";
    }
  }
  return "backend";
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function fromError<T = never>(err: unknown): Result<T> {
  return fail(classifyError(err), describeError(err));
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  jitterMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const TRANSIENT: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["network", "timeout"]);

export function isTransient(error: AttendError): boolean {
  return TRANSIENT.has(error.kind);
}

/**
 * Run `op` until it succeeds, fails with a non-transient error, or the
 * policy's attempts are spent. The last result is returned as-is.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  op: (attempt: number) => Promise<Result<T>>,
  wait: Sleep = sleep,
  random: () => number = Math.random,
): Promise<Result<T>> {
  const attempts = Math.max(1, policy.maxAttempts);
  let last: Result<T> = fail("unconfigured", "no attempt made");

  for (let attempt = 1; attempt <= attempts; attempt++) {
    last = await op(attempt);
    if (last.ok || !isTransient(last.error)) return last;
    if (attempt < attempts) {
      await wait(policy.backoffMs + Math.floor(random() * policy.jitterMs));
    }
  }
  return last;
}
