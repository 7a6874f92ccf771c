import { createApifyClient } from "@/lib/apify";
import type { ResearchConfig } from "@/lib/config/research";
import { logInfo } from "@/lib/observability";
import { createParallelAiClient } from "@/lib/parallelAi";
import { createResearchAggregator, type ResearchAggregator } from "./aggregator";
import { probeCapabilities } from "./capabilityProbe";
import type { ResearchSource } from "./contracts";
import { createCompetitorAnalysisSource } from "./sources/competitorAnalysisSource";
import { createPremiumResearchSource } from "./sources/premiumResearchSource";
import { upstreamBudget } from "./sources/fallback";
import { createTrendAnalysisSource } from "./sources/trendAnalysisSource";

export type ResearchDeps = {
  fetchImpl?: typeof fetch;
};

/**
 * Source roster in configuration order. The premium source is always on
 * the roster; the probe decides whether a round invokes it.
 */
export function buildResearchSources(config: ResearchConfig, deps: ResearchDeps = {}): ResearchSource[] {
  const timeoutMs = config.sourceTimeoutMs;
  // Clients never wait longer than the budget their source gives them.
  const upstreamTimeoutMs = upstreamBudget(timeoutMs);
  const scraper = config.apify.token
    ? createApifyClient({ token: config.apify.token, timeoutMs: upstreamTimeoutMs, fetchImpl: deps.fetchImpl })
    : undefined;

  return [
    createPremiumResearchSource({
      client: createParallelAiClient({
        apiKey: config.parallelAi.apiKey,
        baseUrl: config.parallelAi.baseUrl,
        timeoutMs: upstreamTimeoutMs,
        fetchImpl: deps.fetchImpl,
      }),
      depth: config.parallelAi.depth,
      timeoutMs,
      failurePolicy: config.premiumFailurePolicy,
    }),
    createCompetitorAnalysisSource({ client: scraper, actorId: config.apify.competitorActorId, timeoutMs }),
    createTrendAnalysisSource({ client: scraper, actorId: config.apify.trendActorId, timeoutMs }),
  ];
}

export function buildResearchAggregator(config: ResearchConfig, deps: ResearchDeps = {}): ResearchAggregator {
  const capabilities = probeCapabilities(config);
  logInfo("research.capabilities", { available: Array.from(capabilities) });

  return createResearchAggregator({
    sources: buildResearchSources(config, deps),
    capabilities,
    roundDeadlineMs: config.roundDeadlineMs,
  });
}

export { createResearchAggregator, type ResearchAggregator } from "./aggregator";
export { probeCapabilities } from "./capabilityProbe";
export * from "./contracts";
export { assembleReport, type ResearchReport } from "./report";
