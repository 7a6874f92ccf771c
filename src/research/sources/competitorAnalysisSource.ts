import { z } from "zod";
import type { ApifyClient, ApifyItem } from "@/lib/apify";
import { ResponseFormatError } from "@/lib/externalServiceError";
import type { RequestContext, ResearchSource } from "../contracts";
import { scrapeWithFallback, upstreamBudget } from "./fallback";

export const COMPETITOR_ANALYSIS_SOURCE_ID = "competitor-analysis";

const MAX_COMPETITORS = 5;

const ProfileSchema = z.object({
  username: z.string().min(1),
  followersCount: z.number().nonnegative().optional(),
  latestPosts: z
    .array(
      z.object({
        type: z.string().optional(),
        likesCount: z.number().optional(),
        commentsCount: z.number().optional(),
        timestamp: z.string().optional(),
      })
    )
    .optional(),
});

type Profile = z.infer<typeof ProfileSchema>;

export const CompetitorPayloadSchema = z.object({
  top_competitors: z.array(z.string()),
  successful_content_patterns: z.array(z.string()),
  engagement_strategies: z.array(z.string()),
  posting_schedules: z.string(),
  simulated: z.boolean(),
});

export type CompetitorPayload = z.infer<typeof CompetitorPayloadSchema>;

export type CompetitorAnalysisSourceOptions = {
  client?: ApifyClient;
  actorId: string;
  timeoutMs: number;
  upstreamTimeoutMs?: number;
};

export function placeholderCompetitorPayload(context: RequestContext): CompetitorPayload {
  return {
    top_competitors: [],
    successful_content_patterns: [
      `Educational carousels aimed at ${context.niche} beginners`,
      "Behind-the-scenes Reels",
    ],
    engagement_strategies: [
      "Reply to every comment within the first hour",
      `Collaborate with peers in the ${context.niche} niche`,
    ],
    posting_schedules: "Post 4-5 times per week in the early evening",
    simulated: true,
  };
}

function engagement(post: { likesCount?: number; commentsCount?: number }) {
  return (post.likesCount ?? 0) + (post.commentsCount ?? 0);
}

function contentPatterns(profiles: Profile[]): string[] {
  const totals = new Map<string, number>();
  for (const profile of profiles) {
    for (const post of profile.latestPosts ?? []) {
      if (!post.type) continue;
      totals.set(post.type, (totals.get(post.type) ?? 0) + engagement(post));
    }
  }
  return Array.from(totals.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([type, total]) => `${type} posts (${total} total engagements)`);
}

function engagementRates(profiles: Profile[]): string[] {
  const lines: string[] = [];
  for (const profile of profiles) {
    const posts = profile.latestPosts ?? [];
    if (!profile.followersCount || posts.length === 0) continue;
    const avg = posts.reduce((sum, post) => sum + engagement(post), 0) / posts.length;
    const rate = ((avg / profile.followersCount) * 100).toFixed(1);
    lines.push(`@${profile.username} averages ${rate}% engagement per post`);
  }
  return lines;
}

function postingSchedule(profiles: Profile[]): string {
  const hours = new Map<number, number>();
  for (const profile of profiles) {
    for (const post of profile.latestPosts ?? []) {
      if (!post.timestamp) continue;
      const at = new Date(post.timestamp);
      if (Number.isNaN(at.getTime())) continue;
      const hour = at.getUTCHours();
      hours.set(hour, (hours.get(hour) ?? 0) + 1);
    }
  }
  if (hours.size === 0) return "No posting schedule data";

  const [peak] = Array.from(hours.entries()).sort((a, b) => b[1] - a[1] || a[0] - b[0]);
  return `Most competitor posts go out around ${String(peak[0]).padStart(2, "0")}:00 UTC`;
}

export function summarizeCompetitors(items: ApifyItem[]): CompetitorPayload {
  const profiles: Profile[] = [];
  for (const item of items) {
    const parsed = ProfileSchema.safeParse(item);
    if (parsed.success) profiles.push(parsed.data);
  }
  if (profiles.length === 0) {
    throw new ResponseFormatError("apify", "competitor scrape returned no usable profiles");
  }

  const ranked = [...profiles]
    .sort((a, b) => (b.followersCount ?? 0) - (a.followersCount ?? 0))
    .slice(0, MAX_COMPETITORS);

  return {
    top_competitors: ranked.map((p) => p.username),
    successful_content_patterns: contentPatterns(ranked),
    engagement_strategies: engagementRates(ranked),
    posting_schedules: postingSchedule(ranked),
    simulated: false,
  };
}

export function createCompetitorAnalysisSource(
  opts: CompetitorAnalysisSourceOptions
): ResearchSource<CompetitorPayload> {
  const upstreamTimeoutMs = upstreamBudget(opts.timeoutMs, opts.upstreamTimeoutMs);

  return {
    id: COMPETITOR_ANALYSIS_SOURCE_ID,
    optional: false,
    timeoutMs: opts.timeoutMs,
    isAvailable: () => true,
    invoke(context, signal) {
      return scrapeWithFallback({
        source: COMPETITOR_ANALYSIS_SOURCE_ID,
        client: opts.client,
        upstreamTimeoutMs,
        signal,
        scrape: async (client, budgeted) => {
          const items = await client.runActor(
            opts.actorId,
            { search: `${context.niche} ${context.platform}`, searchType: "user", searchLimit: 10 },
            budgeted
          );
          return summarizeCompetitors(items);
        },
        fallback: () => placeholderCompetitorPayload(context),
      });
    },
  };
}
