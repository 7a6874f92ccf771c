import type { PremiumFailurePolicy, ResearchDepth } from "@/lib/config/research";
import { logWarn } from "@/lib/observability";
import type { ParallelAiClient } from "@/lib/parallelAi";
import type { RequestContext, ResearchSource } from "../contracts";
import { classifyFailure } from "../errors";
import { upstreamBudget, withUpstreamBudget } from "./fallback";

export const PREMIUM_RESEARCH_SOURCE_ID = "premium-research";

export type PremiumResearchPayload = {
  text: string;
  simulated: boolean;
};

export type PremiumResearchSourceOptions = {
  client: ParallelAiClient;
  depth: ResearchDepth;
  timeoutMs: number;
  /** Bound on the client call, retries included. Defaults to the source timeout minus headroom. */
  upstreamTimeoutMs?: number;
  failurePolicy?: PremiumFailurePolicy;
};

export function buildResearchQuery(context: RequestContext): string {
  const goals = context.goals.length ? context.goals.join(", ") : "general growth";
  return `${context.platform} growth research for the ${context.niche} niche. Goals: ${goals}.`;
}

function simulatedResearch(context: RequestContext): PremiumResearchPayload {
  return {
    text:
      `Simulated ${context.niche} market analysis: demand in this space is growing, ` +
      `educational content outperforms promotional posts, and lead magnets drive the most sign-ups.`,
    simulated: true,
  };
}

export function createPremiumResearchSource(
  opts: PremiumResearchSourceOptions
): ResearchSource<PremiumResearchPayload> {
  const failurePolicy = opts.failurePolicy ?? "fail";
  const upstreamTimeoutMs = upstreamBudget(opts.timeoutMs, opts.upstreamTimeoutMs);

  return {
    id: PREMIUM_RESEARCH_SOURCE_ID,
    optional: true,
    timeoutMs: opts.timeoutMs,
    isAvailable: (capabilities) => capabilities.has("premium-research"),
    async invoke(context, signal) {
      try {
        const text = await withUpstreamBudget(
          (budgeted) => opts.client.research({ query: buildResearchQuery(context), depth: opts.depth }, budgeted),
          upstreamTimeoutMs,
          PREMIUM_RESEARCH_SOURCE_ID,
          signal
        );
        return { text, simulated: false };
      } catch (err) {
        if (failurePolicy === "fail") throw err;
        logWarn("research.source.simulated", {
          source: PREMIUM_RESEARCH_SOURCE_ID,
          reason: classifyFailure(err),
        });
        return simulatedResearch(context);
      }
    },
  };
}
