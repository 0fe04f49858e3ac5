import type { GateErrorCode } from "../types/Pack";
import { GateError, errorMessage } from "./errors";

export interface RetryOptions {
  label: string;                 // para logs, ej. "critic round 02"
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  failureCode: Extract<GateErrorCode, "EvaluationFailed" | "RegenerationFailed">;
  signal?: AbortSignal | undefined;
}

/**
 * Ejecuta `fn` con timeout por intento y reintentos con backoff exponencial +
 * jitter. Un abort del llamador corta de inmediato con código `Aborted`; un
 * timeout cuenta como intento `TimeoutExceeded` y, agotados los intentos, escala
 * a `failureCode`. Los errores con `retryable: false` no se reintentan.
 */
export async function withRetry<T>(fn: (signal: AbortSignal) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = 1 + opts.retries;
  let lastErr: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt++) {
    throwIfAborted(opts.signal, opts.label);
    try {
      return await attemptWithTimeout(fn, opts.timeoutMs, opts.label, opts.signal);
    } catch (e) {
      throwIfAborted(opts.signal, opts.label);
      lastErr = e;
      if (!isRetryable(e) || attempt + 1 >= attempts) break;

      const wait = backoffMs(opts.backoffMs, attempt);
      console.warn(`[retry] ${opts.label}: ${errorMessage(e)}; attempt ${attempt + 2}/${attempts} in ${wait}ms`);
      await sleep(wait, opts.signal, opts.label);
    }
  }

  const timedOut = lastErr instanceof GateError && lastErr.code === "TimeoutExceeded";
  throw new GateError(
    opts.failureCode,
    `${opts.label} failed${timedOut ? " (TimeoutExceeded)" : ""}: ${errorMessage(lastErr)}`,
    { cause: lastErr }
  );
}

async function attemptWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  outer: AbortSignal | undefined
): Promise<T> {
  const controller = new AbortController();
  let rejectAborted: (err: GateError) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onOuterAbort = () => {
    controller.abort(outer?.reason);
    rejectAborted(abortError(outer, label));
  };
  outer?.addEventListener("abort", onOuterAbort, { once: true });

  let tid: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    tid = setTimeout(() => {
      const err = new GateError("TimeoutExceeded", `${label} exceeded ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    // aunque el adaptador ignore su signal, no sobrevive al timeout ni al abort del llamador
    return await Promise.race([fn(controller.signal), timeout, aborted]);
  } finally {
    clearTimeout(tid);
    outer?.removeEventListener("abort", onOuterAbort);
  }
}

function isRetryable(e: unknown): boolean {
  if (e instanceof GateError) return e.code === "TimeoutExceeded";
  if (e instanceof Error && "retryable" in e) return e.retryable !== false;
  return true;
}

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) throw abortError(signal, label);
}

function abortError(signal: AbortSignal | undefined, label: string): GateError {
  return new GateError("Aborted", `${label} aborted: ${errorMessage(signal?.reason ?? "cancelled")}`, {
    cause: signal?.reason,
  });
}

export function backoffMs(base: number, attempt: number): number {
  const factor = 2 ** attempt;
  const jitter = Math.floor(Math.random() * Math.min(200, base));
  return base * factor + jitter;
}

function sleep(ms: number, signal: AbortSignal | undefined, label: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(tid);
      reject(new GateError("Aborted", `${label} aborted during backoff`, { cause: signal?.reason }));
    };
    const tid = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
