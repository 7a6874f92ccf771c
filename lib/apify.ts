import { z } from "zod";
import {
  DEFAULT_BREAKER,
  DEFAULT_RETRY,
  guardedExternalCall,
  type RetryOptions,
} from "@/lib/externalCallGuard";
import {
  ExternalServiceError,
  ResponseFormatError,
  toExternalServiceError,
} from "@/lib/externalServiceError";
import { fetchWithTimeout } from "@/lib/httpFetch";

const APIFY_BASE = "https://api.apify.com/v2";

const DatasetItemsSchema = z.array(z.record(z.unknown()));

export type ApifyItem = Record<string, unknown>;

export interface ApifyClient {
  runActor(actorId: string, input: Record<string, unknown>, signal?: AbortSignal): Promise<ApifyItem[]>;
}

export type ApifyClientOptions = {
  token: string;
  timeoutMs: number;
  baseUrl?: string;
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
};

function isRetryable(err: unknown) {
  if (err instanceof ExternalServiceError) return err.retryable;
  return err instanceof TypeError;
}

/**
 * Runs an actor synchronously and returns its default dataset. Actor runs
 * are slow, so retries stay off unless the caller asks for them.
 */
export function createApifyClient(opts: ApifyClientOptions): ApifyClient {
  const base = opts.baseUrl ?? APIFY_BASE;

  return {
    async runActor(actorId, input, signal) {
      const label = `apify-${actorId}`;
      return guardedExternalCall({
        breakerKey: label,
        breaker: DEFAULT_BREAKER,
        timeoutMs: opts.timeoutMs,
        retry: opts.retry ?? { ...DEFAULT_RETRY, retries: 0 },
        label: `Apify actor ${actorId}`,
        isRetryable,
        fn: async () => {
          const url = new URL(`${base}/acts/${actorId}/run-sync-get-dataset-items`);
          url.searchParams.set("token", opts.token);

          const res = await fetchWithTimeout(
            url,
            {
              method: "POST",
              headers: { "Content-Type": "application/json" },
              body: JSON.stringify(input),
            },
            { timeoutMs: opts.timeoutMs, signal, fetchImpl: opts.fetchImpl }
          );

          if (!res.ok) {
            throw await toExternalServiceError("apify", `Apify actor ${actorId}`, res);
          }

          let body: unknown;
          try {
            body = await res.json();
          } catch {
            throw new ResponseFormatError("apify", `Apify actor ${actorId} returned a non-JSON body`);
          }

          const items = DatasetItemsSchema.safeParse(body);
          if (!items.success) {
            throw new ResponseFormatError("apify", `Apify actor ${actorId} did not return a dataset`);
          }
          return items.data;
        },
      });
    },
  };
}
