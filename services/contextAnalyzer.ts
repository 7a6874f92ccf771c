import keywords from "@/data/contextKeywords.json";
import { createRequestContext, type RequestContext } from "@/src/research/contracts";

export type ExperienceLevel = "beginner" | "intermediate" | "advanced";

export type QueryAnalysis = {
  context: RequestContext;
  experienceLevel: ExperienceLevel;
  timeline: string | null;
};

const FOLLOWER_GOAL = /(?:reach|get|grow to|want)\s+(\d+(?:,\d+)*)(k?)\s*(?:followers?|subs?)/;
const REVENUE_GOAL = /(?:make|earn|generate|want)\s+\$(\d+(?:,\d+)*)(k?)/;
const TIMELINE_PATTERNS = [
  /in (\d+ (?:months?|weeks?|days?|years?))/,
  /by (\w+ \d{4})/,
  /within (\d+ (?:months?|weeks?|years?))/,
  /over (\d+ (?:months?|weeks?|years?))/,
];

function countHits(text: string, words: readonly string[]) {
  return words.filter((word) => text.includes(word)).length;
}

function parseAmount(digits: string, suffix: string) {
  const value = Number(digits.replace(/,/g, ""));
  return suffix === "k" ? value * 1000 : value;
}

export function detectNiche(text: string): string {
  let best = "general";
  let bestScore = 0;
  for (const [niche, words] of Object.entries(keywords.niches)) {
    const score = countHits(text, words);
    if (score > bestScore) {
      best = niche;
      bestScore = score;
    }
  }
  return best;
}

export function extractGoals(text: string): string[] {
  const goals: string[] = [];

  const followers = FOLLOWER_GOAL.exec(text);
  if (followers) goals.push(`target_followers:${parseAmount(followers[1], followers[2])}`);

  const revenue = REVENUE_GOAL.exec(text);
  if (revenue) goals.push(`target_revenue:${parseAmount(revenue[1], revenue[2])}`);

  if (countHits(text, keywords.influencer) > 0) goals.push("become_influencer");
  if (countHits(text, keywords.independence) > 0) goals.push("financial_independence");

  for (const [audience, words] of Object.entries(keywords.audiences)) {
    if (countHits(text, words) > 0) goals.push(`audience:${audience}`);
  }
  return goals;
}

export function detectPlatform(text: string): string {
  // padded so word-boundary keywords like " ig " match at either end
  const padded = ` ${text} `;
  for (const [platform, words] of Object.entries(keywords.platforms)) {
    if (countHits(padded, words) > 0) return platform;
  }
  return "instagram";
}

export function assessExperience(text: string): ExperienceLevel {
  const beginner = countHits(text, keywords.experience.beginner);
  const advanced = countHits(text, keywords.experience.advanced);
  if (beginner > advanced) return "beginner";
  if (advanced > beginner) return "advanced";
  return "intermediate";
}

export function extractTimeline(text: string): string | null {
  for (const pattern of TIMELINE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[1];
  }
  return null;
}

export function extractRequestContext(query: string): RequestContext {
  const text = query.toLowerCase();
  return createRequestContext({
    niche: detectNiche(text),
    goals: extractGoals(text),
    platform: detectPlatform(text),
  });
}

export function analyzeQuery(query: string): QueryAnalysis {
  const text = query.toLowerCase();
  return {
    context: extractRequestContext(query),
    experienceLevel: assessExperience(text),
    timeline: extractTimeline(text),
  };
}
