import { randomUUID } from "crypto";
import { z } from "zod";
import { logInfo } from "@/lib/observability";
import type { ResearchAggregator } from "@/src/research/aggregator";
import { createRequestContext, type RequestContext } from "@/src/research/contracts";
import { assembleReport, type ResearchReport } from "@/src/research/report";
import { CompetitorPayloadSchema } from "@/src/research/sources/competitorAnalysisSource";
import { nicheHashtags, TrendPayloadSchema } from "@/src/research/sources/trendAnalysisSource";
import { analyzeQuery, type ExperienceLevel } from "./contextAnalyzer";

const BASELINE_RECOMMENDATIONS = [
  "Optimize posting schedule for peak engagement",
  "Create carousel content for better reach",
  "Engage systematically with target audience",
];

const MIN_RECOMMENDATIONS = BASELINE_RECOMMENDATIONS.length;

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export class InvalidStrategyRequestError extends Error {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Invalid strategy request: ${fields.join(", ")}`);
    this.name = "InvalidStrategyRequestError";
    this.fields = fields;
  }
}

export type ConsultationStage = "research" | "complete";

type ConsultationRecord = {
  consultationId: string;
  userId: string;
  stage: ConsultationStage;
  startedAt: string;
  completedAt?: string;
};

export type ConsultationRequest = {
  query: string;
  userId?: string;
};

export type ConsultationResult = {
  status: "research_complete";
  consultationId: string;
  userId: string;
  context: RequestContext;
  experienceLevel: ExperienceLevel;
  timeline: string | null;
  report: ResearchReport;
  recommendations: string[];
};

export type ConsultationStatus =
  | { status: "not_found" }
  | { status: "active"; stage: "research"; startedAt: string; consultationId: string }
  | {
      status: "complete";
      stage: "complete";
      startedAt: string;
      completedAt: string;
      consultationId: string;
    };

const StrategyRequestSchema = z.object({
  niche: z.string().trim().min(1),
  currentFollowers: z.number().int().nonnegative(),
  targetGrowth: z.string().trim().min(1),
  timeline: z.string().trim().min(1),
  userId: z.string().trim().min(1).optional(),
});

export type StrategyRequest = z.input<typeof StrategyRequestSchema> & {
  /** Research from an earlier consultation, used to tailor the plan. */
  report?: ResearchReport;
};

export type GrowthProjection = {
  followers: number;
  growthPercent: number;
};

export type GrowthStrategy = {
  strategyId: string;
  userId: string;
  niche: string;
  currentFollowers: number;
  targetGrowth: string;
  timeline: string;
  contentPlan: {
    postingFrequency: string;
    optimalTimes: string[];
    contentMix: string;
    hashtagStrategy: string;
  };
  engagementPlan: {
    dailyLikes: number;
    dailyComments: number;
    dailyFollows: number;
    targeting: string;
  };
  growthProjections: {
    week1: GrowthProjection;
    week2: GrowthProjection;
    week4: GrowthProjection;
    confidence: string;
  };
  researchBacked: boolean;
};

// Cumulative growth over the first month.
const PROJECTED_GROWTH_PERCENT = { week1: 5, week2: 12, week4: 25 } as const;

// Daily actions kept under the platform's automation limits.
const DAILY_ENGAGEMENT = { likes: 60, comments: 15, follows: 20 } as const;

export function projectFollowers(currentFollowers: number, growthPercent: number): GrowthProjection {
  return {
    followers: Math.floor((currentFollowers * (100 + growthPercent)) / 100),
    growthPercent,
  };
}

export type ConsultationServiceDeps = {
  aggregator: ResearchAggregator;
  now?: () => Date;
  idFactory?: () => string;
};

export function buildRecommendations(report: ResearchReport): string[] {
  const lines: string[] = [];

  const trends = TrendPayloadSchema.safeParse(report.contentTrends);
  if (trends.success) {
    const [format] = trends.data.trending_formats;
    if (format) lines.push(`Lean into ${format} for the next few weeks`);
    if (trends.data.hashtag_trends.length > 0) {
      lines.push(`Test these hashtags: ${trends.data.hashtag_trends.slice(0, 3).join(" ")}`);
    }
  }

  const competitors = CompetitorPayloadSchema.safeParse(report.competitorAnalysis);
  if (competitors.success) {
    const top = competitors.data.top_competitors.slice(0, 3);
    if (top.length > 0) {
      lines.push(`Study what ${top.map((name) => `@${name}`).join(", ")} are posting`);
    }
  }

  for (const line of BASELINE_RECOMMENDATIONS) {
    if (lines.length >= MIN_RECOMMENDATIONS) break;
    if (!lines.includes(line)) lines.push(line);
  }
  return lines;
}

function hashtagStrategy(niche: string, report: ResearchReport | undefined): string {
  const [nicheTag] = nicheHashtags(createRequestContext({ niche }));
  const base = `8-12 targeted #${nicheTag} hashtags + 3-5 reach tags`;
  const trends = TrendPayloadSchema.safeParse(report?.contentTrends);
  if (!trends.success || trends.data.hashtag_trends.length === 0) return base;
  return `${base}, starting with ${trends.data.hashtag_trends.slice(0, 3).join(" ")}`;
}

function engagementTargeting(niche: string, report: ResearchReport | undefined): string {
  const base = `Active ${niche} audience with 2-8% engagement`;
  const competitors = CompetitorPayloadSchema.safeParse(report?.competitorAnalysis);
  if (!competitors.success || competitors.data.top_competitors.length === 0) return base;
  const names = competitors.data.top_competitors.slice(0, 3).map((name) => `@${name}`);
  return `${base}, starting with followers of ${names.join(", ")}`;
}

// Placeholder payloads parse too, but carry `simulated: true`.
function isResearchBacked(report: ResearchReport | undefined): boolean {
  const trends = TrendPayloadSchema.safeParse(report?.contentTrends);
  const competitors = CompetitorPayloadSchema.safeParse(report?.competitorAnalysis);
  return (
    (trends.success && !trends.data.simulated) || (competitors.success && !competitors.data.simulated)
  );
}

export function createConsultationService(deps: ConsultationServiceDeps) {
  const now = deps.now ?? (() => new Date());
  const idFactory = deps.idFactory ?? (() => `luna_${randomUUID()}`);
  // latest consultation per user, in-process only
  const consultations = new Map<string, ConsultationRecord>();

  async function consult(req: ConsultationRequest): Promise<ConsultationResult> {
    const query = req.query.trim();
    if (!query) {
      throw new InvalidQueryError("query must not be empty");
    }
    const userId = req.userId?.trim() || "anonymous";

    const analysis = analyzeQuery(query);
    const record: ConsultationRecord = {
      consultationId: idFactory(),
      userId,
      stage: "research",
      startedAt: now().toISOString(),
    };
    consultations.set(userId, record);
    logInfo("consultation.started", {
      consultationId: record.consultationId,
      niche: analysis.context.niche,
      platform: analysis.context.platform,
    });

    const result = await deps.aggregator.aggregate(analysis.context);
    const report = assembleReport(result);

    record.stage = "complete";
    record.completedAt = now().toISOString();
    logInfo("consultation.completed", {
      consultationId: record.consultationId,
      quality: report.researchQuality,
    });

    return {
      status: "research_complete",
      consultationId: record.consultationId,
      userId,
      context: analysis.context,
      experienceLevel: analysis.experienceLevel,
      timeline: analysis.timeline,
      report,
      recommendations: buildRecommendations(report),
    };
  }

  function generateStrategy(req: StrategyRequest): GrowthStrategy {
    const parsed = StrategyRequestSchema.safeParse(req);
    if (!parsed.success) {
      throw new InvalidStrategyRequestError(
        Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join("."))))
      );
    }
    const { niche, currentFollowers, targetGrowth, timeline } = parsed.data;
    const userId = parsed.data.userId ?? "anonymous";

    const strategy: GrowthStrategy = {
      strategyId: idFactory(),
      userId,
      niche,
      currentFollowers,
      targetGrowth,
      timeline,
      contentPlan: {
        postingFrequency: "4 posts per week",
        optimalTimes: ["7:00 PM", "12:00 PM", "8:00 PM"],
        contentMix: "40% educational, 30% behind-scenes, 20% engaging, 10% UGC",
        hashtagStrategy: hashtagStrategy(niche, req.report),
      },
      engagementPlan: {
        dailyLikes: DAILY_ENGAGEMENT.likes,
        dailyComments: DAILY_ENGAGEMENT.comments,
        dailyFollows: DAILY_ENGAGEMENT.follows,
        targeting: engagementTargeting(niche, req.report),
      },
      growthProjections: {
        week1: projectFollowers(currentFollowers, PROJECTED_GROWTH_PERCENT.week1),
        week2: projectFollowers(currentFollowers, PROJECTED_GROWTH_PERCENT.week2),
        week4: projectFollowers(currentFollowers, PROJECTED_GROWTH_PERCENT.week4),
        confidence: "85% based on niche analysis",
      },
      researchBacked: isResearchBacked(req.report),
    };

    logInfo("strategy.generated", {
      strategyId: strategy.strategyId,
      niche,
      researchBacked: strategy.researchBacked,
    });
    return strategy;
  }

  function getStatus(userId: string): ConsultationStatus {
    const record = consultations.get(userId);
    if (!record) return { status: "not_found" };
    if (record.stage === "complete" && record.completedAt) {
      return {
        status: "complete",
        stage: "complete",
        startedAt: record.startedAt,
        completedAt: record.completedAt,
        consultationId: record.consultationId,
      };
    }
    return {
      status: "active",
      stage: "research",
      startedAt: record.startedAt,
      consultationId: record.consultationId,
    };
  }

  return { consult, generateStrategy, getStatus };
}

export type ConsultationService = ReturnType<typeof createConsultationService>;
