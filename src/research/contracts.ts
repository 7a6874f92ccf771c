import type { FailureKind } from "./errors";

export type CapabilityId = "premium-research" | "scraper";

export type Capabilities = ReadonlySet<CapabilityId>;

export type RequestContext = Readonly<{
  niche: string;
  goals: readonly string[];
  platform: string;
}>;

export function createRequestContext(input: {
  niche: string;
  goals?: Iterable<string>;
  platform?: string;
}): RequestContext {
  const goals = Object.freeze(Array.from(new Set(input.goals ?? [])));
  return Object.freeze({
    niche: input.niche.trim() || "general",
    goals,
    platform: input.platform?.trim() || "instagram",
  });
}

/**
 * One independently invokable research provider. `isAvailable` is the
 * static descriptor part; `invoke` does the work and may reject with any
 * error, which the aggregator turns into a failure outcome.
 */
export interface ResearchSource<P = unknown> {
  readonly id: string;
  readonly optional: boolean;
  readonly timeoutMs: number;
  isAvailable(capabilities: Capabilities): boolean;
  invoke(context: RequestContext, signal?: AbortSignal): Promise<P>;
}

export type SourceFailure = Readonly<{
  kind: FailureKind;
  message: string;
}>;

export type SourceOutcome =
  | Readonly<{ status: "success"; source: string; payload: unknown }>
  | Readonly<{ status: "failure"; source: string; error: SourceFailure }>;

export type ResearchQuality = "comprehensive" | "basic";

export type AggregatorState = "idle" | "dispatched" | "collecting" | "completed";

export type AggregateResult = Readonly<{
  state: "completed";
  outcomes: readonly SourceOutcome[];
  quality: ResearchQuality;
  completedAt: string;
}>;
