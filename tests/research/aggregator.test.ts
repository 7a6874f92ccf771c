import { createResearchAggregator } from "@/src/research/aggregator";
import { createRequestContext, type AggregatorState, type CapabilityId } from "@/src/research/contracts";
import { ResearchSourceError } from "@/src/research/errors";
import { delay, rejectAfter, silenceLogs, stubSource } from "../helpers/research";

const context = createRequestContext({ niche: "fitness_health", goals: ["target_followers:10000"] });
const premiumOn = new Set<CapabilityId>(["premium-research"]);
const premiumOff = new Set<CapabilityId>();

const competitorPayload = { top_competitors: ["coach_b", "coach_a"] };
const trendPayload = { trending_formats: ["Reels"] };

describe("createResearchAggregator", () => {
  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("completeness", () => {
    it("completes with no outcomes when no sources are configured", async () => {
      const aggregator = createResearchAggregator({ sources: [], capabilities: premiumOn });

      const result = await aggregator.aggregate(context);

      expect(result.state).toBe("completed");
      expect(result.outcomes).toEqual([]);
      expect(result.quality).toBe("basic");
    });

    it("completes with no outcomes when the only source is unavailable", async () => {
      const premium = stubSource("premium-research", async () => "analysis", { optional: true });
      const aggregator = createResearchAggregator({ sources: [premium.source], capabilities: premiumOff });

      const result = await aggregator.aggregate(context);

      expect(result.outcomes).toEqual([]);
      expect(result.quality).toBe("basic");
      expect(premium.invoke).not.toHaveBeenCalled();
    });

    it("returns one outcome per invoked source", async () => {
      const sources = ["a", "b", "c", "d"].map((id) => stubSource(id, async () => id).source);
      const aggregator = createResearchAggregator({ sources, capabilities: premiumOff });

      const result = await aggregator.aggregate(context);

      expect(result.outcomes).toHaveLength(4);
    });
  });

  it("dispatches every source before any of them settles", async () => {
    let release: (value: string) => void = () => undefined;
    const slow = stubSource("slow", () => new Promise<string>((resolve) => { release = resolve; }));
    const other = stubSource("other", async () => "done");
    const aggregator = createResearchAggregator({ sources: [slow.source, other.source], capabilities: premiumOff });

    const pending = aggregator.aggregate(context);

    expect(slow.invoke).toHaveBeenCalledWith(context, expect.any(AbortSignal));
    expect(other.invoke).toHaveBeenCalledTimes(1);

    release("late");
    const result = await pending;
    expect(result.outcomes.map((o) => o.status)).toEqual(["success", "success"]);
  });

  it("keeps configuration order regardless of completion order", async () => {
    const finished: string[] = [];
    const track = (id: string, ms: number, optional = false) =>
      stubSource(
        id,
        async () => {
          const value = await delay(ms, `${id}-payload`);
          finished.push(id);
          return value;
        },
        { optional }
      );
    const premium = track("premium-research", 60, true);
    const competitor = track("competitor-analysis", 30);
    const trend = track("trend-analysis", 1);
    const aggregator = createResearchAggregator({
      sources: [premium.source, competitor.source, trend.source],
      capabilities: premiumOn,
    });

    const result = await aggregator.aggregate(context);

    expect(finished).toEqual(["trend-analysis", "competitor-analysis", "premium-research"]);
    expect(result.outcomes).toEqual([
      { status: "success", source: "premium-research", payload: "premium-research-payload" },
      { status: "success", source: "competitor-analysis", payload: "competitor-analysis-payload" },
      { status: "success", source: "trend-analysis", payload: "trend-analysis-payload" },
    ]);
  });

  it("isolates a faulty source from its siblings", async () => {
    const first = stubSource("first", async () => "one");
    const faulty = stubSource("faulty", () => {
      throw new Error("boom");
    });
    const last = stubSource("last", () => delay(5, "three"));
    const aggregator = createResearchAggregator({
      sources: [first.source, faulty.source, last.source],
      capabilities: premiumOff,
    });

    const result = await aggregator.aggregate(context);

    expect(result.outcomes).toEqual([
      { status: "success", source: "first", payload: "one" },
      { status: "failure", source: "faulty", error: { kind: "network", message: "boom" } },
      { status: "success", source: "last", payload: "three" },
    ]);
  });

  describe("quality", () => {
    const build = (available: boolean, succeeds: boolean) => {
      const premium = stubSource(
        "premium-research",
        async () => {
          if (!succeeds) throw new ResearchSourceError("auth", "key rejected");
          return "niche X market analysis";
        },
        { optional: true }
      );
      const competitor = stubSource("competitor-analysis", async () => competitorPayload);
      const aggregator = createResearchAggregator({
        sources: [premium.source, competitor.source],
        capabilities: available ? premiumOn : premiumOff,
      });
      return { aggregator, premium };
    };

    it("is comprehensive when premium is available and succeeds", async () => {
      const { aggregator } = build(true, true);

      expect((await aggregator.aggregate(context)).quality).toBe("comprehensive");
    });

    it("is basic when premium is available but fails", async () => {
      const { aggregator } = build(true, false);

      const result = await aggregator.aggregate(context);

      expect(result.quality).toBe("basic");
      expect(result.outcomes[0]).toEqual({
        status: "failure",
        source: "premium-research",
        error: { kind: "auth", message: "key rejected" },
      });
    });

    it("is basic when premium is unavailable, even if it would succeed", async () => {
      const { aggregator, premium } = build(false, true);

      const result = await aggregator.aggregate(context);

      expect(result.quality).toBe("basic");
      expect(premium.invoke).not.toHaveBeenCalled();
    });

    it("is basic when premium is unavailable and would fail", async () => {
      const { aggregator, premium } = build(false, false);

      const result = await aggregator.aggregate(context);

      expect(result.quality).toBe("basic");
      expect(premium.invoke).not.toHaveBeenCalled();
    });
  });

  it("omits an unavailable optional source from the outcomes entirely", async () => {
    const premium = stubSource("premium-research", async () => "analysis", { optional: true });
    const competitor = stubSource("competitor-analysis", async () => competitorPayload);
    const aggregator = createResearchAggregator({
      sources: [premium.source, competitor.source],
      capabilities: premiumOff,
    });

    const result = await aggregator.aggregate(context);

    expect(aggregator.plan().map((s) => s.id)).toEqual(["competitor-analysis"]);
    expect(result.outcomes.map((o) => o.source)).toEqual(["competitor-analysis"]);
  });

  describe("scenarios", () => {
    it("premium unavailable, both always-on sources succeed", async () => {
      const premium = stubSource("premium-research", async () => "analysis", { optional: true });
      const competitor = stubSource("competitor-analysis", async () => competitorPayload);
      const trend = stubSource("trend-analysis", async () => trendPayload);
      const aggregator = createResearchAggregator({
        sources: [premium.source, competitor.source, trend.source],
        capabilities: premiumOff,
      });

      const result = await aggregator.aggregate(context);

      expect(result.quality).toBe("basic");
      expect(result.outcomes).toEqual([
        { status: "success", source: "competitor-analysis", payload: competitorPayload },
        { status: "success", source: "trend-analysis", payload: trendPayload },
      ]);
    });

    it("premium succeeds while the competitor source hits a network error", async () => {
      const premium = stubSource("premium-research", async () => "niche X market analysis", { optional: true });
      const competitor = stubSource("competitor-analysis", () =>
        rejectAfter(5, new ResearchSourceError("network", "connect ECONNREFUSED"))
      );
      const trend = stubSource("trend-analysis", async () => trendPayload);
      const aggregator = createResearchAggregator({
        sources: [premium.source, competitor.source, trend.source],
        capabilities: premiumOn,
      });

      const result = await aggregator.aggregate(context);

      expect(result.quality).toBe("comprehensive");
      expect(result.outcomes).toEqual([
        { status: "success", source: "premium-research", payload: "niche X market analysis" },
        {
          status: "failure",
          source: "competitor-analysis",
          error: { kind: "network", message: "connect ECONNREFUSED" },
        },
        { status: "success", source: "trend-analysis", payload: trendPayload },
      ]);
    });

    it("every source fails or times out without rejecting", async () => {
      const premium = stubSource(
        "premium-research",
        () => rejectAfter(1, new ResearchSourceError("auth", "key rejected")),
        { optional: true }
      );
      const competitor = stubSource("competitor-analysis", () => new Promise<never>(() => undefined), {
        timeoutMs: 20,
      });
      const trend = stubSource("trend-analysis", () => {
        throw new ResearchSourceError("upstream_format", "unreadable body");
      });
      const aggregator = createResearchAggregator({
        sources: [premium.source, competitor.source, trend.source],
        capabilities: premiumOn,
      });

      const result = await aggregator.aggregate(context);

      expect(result.state).toBe("completed");
      expect(result.quality).toBe("basic");
      expect(result.outcomes).toEqual([
        { status: "failure", source: "premium-research", error: { kind: "auth", message: "key rejected" } },
        {
          status: "failure",
          source: "competitor-analysis",
          error: { kind: "timeout", message: "competitor-analysis timed out after 20ms" },
        },
        {
          status: "failure",
          source: "trend-analysis",
          error: { kind: "upstream_format", message: "unreadable body" },
        },
      ]);
    });
  });

  it("aborts the signal of a source that timed out", async () => {
    const seen: AbortSignal[] = [];
    const hanging = stubSource(
      "hanging",
      (signal) => {
        if (signal) seen.push(signal);
        return new Promise<never>(() => undefined);
      },
      { timeoutMs: 10 }
    );
    const aggregator = createResearchAggregator({ sources: [hanging.source], capabilities: premiumOff });

    await aggregator.aggregate(context);

    expect(seen[0].aborted).toBe(true);
  });

  it("marks unfinished sources as timed out when the round deadline passes", async () => {
    const slow = stubSource("slow", () => new Promise<never>(() => undefined), { timeoutMs: 5000 });
    const quick = stubSource("quick", async () => "fast");
    const aggregator = createResearchAggregator({
      sources: [slow.source, quick.source],
      capabilities: premiumOff,
      roundDeadlineMs: 30,
    });

    const result = await aggregator.aggregate(context);

    expect(result.outcomes).toEqual([
      {
        status: "failure",
        source: "slow",
        error: { kind: "timeout", message: "research round deadline of 30ms exceeded" },
      },
      { status: "success", source: "quick", payload: "fast" },
    ]);
  });

  it("reports state transitions and survives a throwing hook", async () => {
    const states: AggregatorState[] = [];
    const aggregator = createResearchAggregator({
      sources: [stubSource("only", async () => "ok").source],
      capabilities: premiumOff,
      onStateChange: (state) => {
        states.push(state);
        if (state === "collecting") throw new Error("hook failed");
      },
    });

    const result = await aggregator.aggregate(context);

    expect(states).toEqual(["idle", "dispatched", "collecting", "completed"]);
    expect(result.state).toBe("completed");
  });

  it("stamps completion time and freezes the result", async () => {
    const aggregator = createResearchAggregator({
      sources: [stubSource("only", async () => "ok").source],
      capabilities: premiumOff,
      now: () => new Date("2026-01-05T10:00:00.000Z"),
    });

    const result = await aggregator.aggregate(context);

    expect(result.completedAt).toBe("2026-01-05T10:00:00.000Z");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.outcomes)).toBe(true);
    expect(Object.isFrozen(result.outcomes[0])).toBe(true);
  });
});
