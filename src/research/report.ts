import type { AggregateResult, ResearchQuality, SourceOutcome } from "./contracts";

export type ReportRole = "marketResearch" | "competitorAnalysis" | "contentTrends";

// Position i of a full round fills ROLE_ORDER[i]. The optional premium
// source leads the plan, so a shorter round is aligned from the end.
const ROLE_ORDER: readonly ReportRole[] = ["marketResearch", "competitorAnalysis", "contentTrends"];

export const REPORT_PLACEHOLDERS: Readonly<Record<ReportRole, string>> = {
  marketResearch: "Market research is not available for this consultation.",
  competitorAnalysis: "Competitor analysis could not be completed right now.",
  contentTrends: "Content trend analysis could not be completed right now.",
};

export const MARKET_RESEARCH_NOT_CONFIGURED = "Premium market research is not configured.";

export type ResearchReport = {
  marketResearch: unknown;
  competitorAnalysis: unknown;
  contentTrends: unknown;
  researchQuality: ResearchQuality;
  researchCompletedAt: string;
  sourcesSucceeded: number;
  sourcesFailed: number;
};

function sectionFor(role: ReportRole, outcome: SourceOutcome | undefined): unknown {
  if (!outcome) {
    return role === "marketResearch" ? MARKET_RESEARCH_NOT_CONFIGURED : REPORT_PLACEHOLDERS[role];
  }
  return outcome.status === "success" ? outcome.payload : REPORT_PLACEHOLDERS[role];
}

export function assembleReport(result: AggregateResult): ResearchReport {
  const offset = Math.max(0, ROLE_ORDER.length - result.outcomes.length);
  const byRole = new Map<ReportRole, SourceOutcome>();
  result.outcomes.forEach((outcome, index) => {
    const role = ROLE_ORDER[index + offset];
    if (role) byRole.set(role, outcome);
  });

  const succeeded = result.outcomes.filter((outcome) => outcome.status === "success").length;

  return {
    marketResearch: sectionFor("marketResearch", byRole.get("marketResearch")),
    competitorAnalysis: sectionFor("competitorAnalysis", byRole.get("competitorAnalysis")),
    contentTrends: sectionFor("contentTrends", byRole.get("contentTrends")),
    researchQuality: result.quality,
    researchCompletedAt: result.completedAt,
    sourcesSucceeded: succeeded,
    sourcesFailed: result.outcomes.length - succeeded,
  };
}
