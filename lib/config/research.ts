import { z } from "zod";
import { cfg, type EnvReader } from "@/lib/config";
import { ConfigError } from "@/lib/configGuard";

const PositiveInt = z.coerce.number().int().positive();

export const ResearchEnvSchema = z.object({
  PARALLEL_AI_API_KEY: z.string().optional(),
  PARALLEL_AI_BASE_URL: z.string().url().default("https://api.parallel.ai/v1"),
  PARALLEL_AI_DEPTH: z.enum(["basic", "comprehensive"]).default("comprehensive"),
  APIFY_API_TOKEN: z.string().optional(),
  APIFY_COMPETITOR_ACTOR: z.string().default("apify~instagram-search-scraper"),
  APIFY_TREND_ACTOR: z.string().default("apify~instagram-hashtag-scraper"),
  RESEARCH_SOURCE_TIMEOUT_MS: PositiveInt.default(30_000),
  RESEARCH_ROUND_DEADLINE_MS: PositiveInt.optional(),
  PREMIUM_FAILURE_POLICY: z.enum(["fail", "simulate"]).default("fail"),
});

const ENV_KEYS = Object.keys(ResearchEnvSchema.shape);

export type ResearchDepth = "basic" | "comprehensive";

/**
 * What the premium source does when its upstream call fails:
 * `fail` reports a visible failure, `simulate` substitutes a canned analysis.
 */
export type PremiumFailurePolicy = "fail" | "simulate";

export type ResearchConfig = Readonly<{
  parallelAi: Readonly<{ apiKey?: string; baseUrl: string; depth: ResearchDepth }>;
  apify: Readonly<{ token?: string; competitorActorId: string; trendActorId: string }>;
  sourceTimeoutMs: number;
  roundDeadlineMs?: number;
  premiumFailurePolicy: PremiumFailurePolicy;
}>;

/**
 * Reads the research settings once, at startup. Pass a reader to build a
 * config from something other than the process environment.
 */
export function loadResearchConfig(read: EnvReader = cfg.raw): ResearchConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of ENV_KEYS) {
    const value = read(key);
    raw[key] = value && value.trim() ? value.trim() : undefined;
  }

  const parsed = ResearchEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const names = Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join("."))));
    throw new ConfigError(`Invalid research configuration: ${names.join(", ")}`, names);
  }

  const env = parsed.data;
  return Object.freeze({
    parallelAi: Object.freeze({
      apiKey: env.PARALLEL_AI_API_KEY,
      baseUrl: env.PARALLEL_AI_BASE_URL.replace(/\/+$/, ""),
      depth: env.PARALLEL_AI_DEPTH,
    }),
    apify: Object.freeze({
      token: env.APIFY_API_TOKEN,
      competitorActorId: env.APIFY_COMPETITOR_ACTOR,
      trendActorId: env.APIFY_TREND_ACTOR,
    }),
    sourceTimeoutMs: env.RESEARCH_SOURCE_TIMEOUT_MS,
    roundDeadlineMs: env.RESEARCH_ROUND_DEADLINE_MS,
    premiumFailurePolicy: env.PREMIUM_FAILURE_POLICY,
  });
}
