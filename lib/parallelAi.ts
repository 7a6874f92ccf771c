import { z } from "zod";
import type { ResearchDepth } from "@/lib/config/research";
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
import { requireValue } from "@/lib/configGuard";
import { fetchWithTimeout } from "@/lib/httpFetch";

const ResearchResponseSchema = z.object({ result: z.string().min(1) });

export type ParallelAiResearchRequest = {
  query: string;
  depth: ResearchDepth;
};

export interface ParallelAiClient {
  research(req: ParallelAiResearchRequest, signal?: AbortSignal): Promise<string>;
}

export type ParallelAiClientOptions = {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
};

function isRetryable(err: unknown) {
  if (err instanceof ExternalServiceError) return err.retryable;
  // undici reports refused connections and DNS failures as TypeError
  return err instanceof TypeError;
}

export function createParallelAiClient(opts: ParallelAiClientOptions): ParallelAiClient {
  const url = `${opts.baseUrl}/research`;

  return {
    async research(req, signal) {
      const apiKey = requireValue(opts.apiKey, "PARALLEL_AI_API_KEY", "Parallel AI research");
      return guardedExternalCall({
        breakerKey: "parallel-ai",
        breaker: DEFAULT_BREAKER,
        timeoutMs: opts.timeoutMs,
        retry: opts.retry ?? DEFAULT_RETRY,
        label: "Parallel AI research",
        isRetryable,
        fn: async () => {
          const res = await fetchWithTimeout(
            url,
            {
              method: "POST",
              headers: {
                Authorization: `Bearer ${apiKey}`,
                "Content-Type": "application/json",
              },
              body: JSON.stringify({ query: req.query, depth: req.depth }),
            },
            { timeoutMs: opts.timeoutMs, signal, fetchImpl: opts.fetchImpl }
          );

          if (!res.ok) {
            throw await toExternalServiceError("parallel-ai", "Parallel AI research", res);
          }

          let body: unknown;
          try {
            body = await res.json();
          } catch {
            throw new ResponseFormatError("parallel-ai", "Parallel AI returned a non-JSON body");
          }

          const parsed = ResearchResponseSchema.safeParse(body);
          if (!parsed.success) {
            throw new ResponseFormatError("parallel-ai", "Parallel AI response is missing `result`");
          }
          return parsed.data.result;
        },
      });
    },
  };
}
