import type { ApifyClient } from "@/lib/apify";
import { withTimeout } from "@/lib/externalCallGuard";
import { errorMessage, logInfo, logWarn } from "@/lib/observability";
import { classifyFailure } from "../errors";

// Leaves room for the fallback to be returned inside the aggregator's bound.
const FALLBACK_HEADROOM_MS = 1000;

export function upstreamBudget(timeoutMs: number, upstreamTimeoutMs?: number) {
  return upstreamTimeoutMs ?? Math.max(1, timeoutMs - FALLBACK_HEADROOM_MS);
}

/**
 * Runs one upstream call within `budgetMs`. The call gets its own signal,
 * linked to the caller's, which is aborted when the budget runs out or the
 * call fails, so no request outlives the source that made it.
 */
export async function withUpstreamBudget<T>(
  run: (signal: AbortSignal) => Promise<T>,
  budgetMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (parent?.aborted) controller.abort();
  parent?.addEventListener("abort", onAbort, { once: true });

  try {
    return await withTimeout(run(controller.signal), budgetMs, label);
  } catch (err) {
    controller.abort();
    throw err;
  } finally {
    parent?.removeEventListener("abort", onAbort);
  }
}

/**
 * Runs an always-on source against the scraper, returning the locally
 * computed payload when there is no scraper or the call fails.
 */
export async function scrapeWithFallback<P>(params: {
  source: string;
  client: ApifyClient | undefined;
  upstreamTimeoutMs: number;
  signal?: AbortSignal;
  scrape: (client: ApifyClient, signal: AbortSignal) => Promise<P>;
  fallback: () => P;
}): Promise<P> {
  const { source, client, upstreamTimeoutMs, signal, scrape, fallback } = params;

  if (!client) {
    logInfo("research.source.offline", { source });
    return fallback();
  }

  try {
    return await withUpstreamBudget((budgeted) => scrape(client, budgeted), upstreamTimeoutMs, source, signal);
  } catch (err) {
    logWarn("research.source.fallback", {
      source,
      reason: classifyFailure(err),
      error: errorMessage(err),
    });
    return fallback();
  }
}
