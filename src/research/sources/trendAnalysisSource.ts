import { z } from "zod";
import type { ApifyClient, ApifyItem } from "@/lib/apify";
import { ResponseFormatError } from "@/lib/externalServiceError";
import type { RequestContext, ResearchSource } from "../contracts";
import { scrapeWithFallback, upstreamBudget } from "./fallback";

export const TREND_ANALYSIS_SOURCE_ID = "trend-analysis";

const FORMAT_LABELS: Record<string, string> = {
  Video: "Reels",
  Sidecar: "Carousels",
  Image: "Photos",
};

const HOOK_MAX_LENGTH = 80;

const PostSchema = z.object({
  type: z.string().optional(),
  caption: z.string().optional(),
  hashtags: z.array(z.string()).optional(),
  likesCount: z.number().optional(),
  commentsCount: z.number().optional(),
});

type Post = z.infer<typeof PostSchema>;

export const TrendPayloadSchema = z.object({
  trending_formats: z.array(z.string()),
  viral_hooks: z.array(z.string()),
  hashtag_trends: z.array(z.string()),
  simulated: z.boolean(),
});

export type TrendPayload = z.infer<typeof TrendPayloadSchema>;

export type TrendAnalysisSourceOptions = {
  client?: ApifyClient;
  actorId: string;
  timeoutMs: number;
  upstreamTimeoutMs?: number;
};

export function nicheHashtags(context: RequestContext): string[] {
  const slug = context.niche.toLowerCase().replace(/[^a-z0-9]+/g, "");
  const platform = context.platform.toLowerCase().replace(/[^a-z0-9]+/g, "");
  return [slug, `${slug}tips`, `${platform}growth`].filter((tag) => tag.length > 0);
}

export function placeholderTrendPayload(context: RequestContext): TrendPayload {
  return {
    trending_formats: ["Reels", "Carousels", "Stories"],
    viral_hooks: [
      `The ${context.niche} mistake nobody talks about`,
      "Three things I wish I knew before starting",
    ],
    hashtag_trends: nicheHashtags(context).map((tag) => `#${tag}`),
    simulated: true,
  };
}

function rankByCount(values: string[]): string[] {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([value]) => value);
}

function hookOf(post: Post): string | undefined {
  const firstLine = post.caption?.split("\n")[0]?.trim();
  if (!firstLine) return undefined;
  return firstLine.length > HOOK_MAX_LENGTH ? `${firstLine.slice(0, HOOK_MAX_LENGTH - 1)}…` : firstLine;
}

export function summarizeTrends(items: ApifyItem[]): TrendPayload {
  const posts: Post[] = [];
  for (const item of items) {
    const parsed = PostSchema.safeParse(item);
    if (parsed.success) posts.push(parsed.data);
  }
  if (posts.length === 0) {
    throw new ResponseFormatError("apify", "trend scrape returned no usable posts");
  }

  const formats = rankByCount(
    posts.flatMap((post) => (post.type ? [FORMAT_LABELS[post.type] ?? post.type] : []))
  ).slice(0, 3);

  const hooks = [...posts]
    .sort(
      (a, b) =>
        (b.likesCount ?? 0) + (b.commentsCount ?? 0) - ((a.likesCount ?? 0) + (a.commentsCount ?? 0))
    )
    .map(hookOf)
    .filter((hook): hook is string => Boolean(hook))
    .slice(0, 3);

  const hashtags = rankByCount(
    posts.flatMap((post) => (post.hashtags ?? []).map((tag) => tag.replace(/^#/, "").toLowerCase()))
  )
    .slice(0, 5)
    .map((tag) => `#${tag}`);

  return {
    trending_formats: formats,
    viral_hooks: hooks,
    hashtag_trends: hashtags,
    simulated: false,
  };
}

export function createTrendAnalysisSource(
  opts: TrendAnalysisSourceOptions
): ResearchSource<TrendPayload> {
  const upstreamTimeoutMs = upstreamBudget(opts.timeoutMs, opts.upstreamTimeoutMs);

  return {
    id: TREND_ANALYSIS_SOURCE_ID,
    optional: false,
    timeoutMs: opts.timeoutMs,
    isAvailable: () => true,
    invoke(context, signal) {
      return scrapeWithFallback({
        source: TREND_ANALYSIS_SOURCE_ID,
        client: opts.client,
        upstreamTimeoutMs,
        signal,
        scrape: async (client, budgeted) => {
          const items = await client.runActor(
            opts.actorId,
            { hashtags: nicheHashtags(context), resultsLimit: 30 },
            budgeted
          );
          return summarizeTrends(items);
        },
        fallback: () => placeholderTrendPayload(context),
      });
    },
  };
}
