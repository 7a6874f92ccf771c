export type FetchTimeoutOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
};

export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

function isAbortError(e: unknown) {
  return e instanceof Error && e.name === "AbortError";
}

export async function fetchWithTimeout(
  input: string | URL,
  init: RequestInit | undefined,
  opts: FetchTimeoutOptions
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);

  const callerSignal = opts.signal;
  if (callerSignal?.aborted) controller.abort();
  const onAbort = () => controller.abort();
  callerSignal?.addEventListener("abort", onAbort, { once: true });

  const doFetch = opts.fetchImpl ?? fetch;

  try {
    return await doFetch(input, {
      ...init,
      signal: controller.signal,
    });
  } catch (e) {
    if (isAbortError(e) || controller.signal.aborted) {
      const reason = callerSignal?.aborted
        ? "Fetch aborted by caller"
        : `Fetch timed out after ${opts.timeoutMs}ms`;
      throw new FetchTimeoutError(reason, opts.timeoutMs);
    }
    throw e;
  } finally {
    clearTimeout(timeout);
    callerSignal?.removeEventListener("abort", onAbort);
  }
}
