import { TimeoutError, withTimeout } from "@/lib/externalCallGuard";
import { logError, logInfo, logWarn } from "@/lib/observability";
import type {
  AggregateResult,
  AggregatorState,
  Capabilities,
  RequestContext,
  ResearchQuality,
  ResearchSource,
  SourceOutcome,
} from "./contracts";
import { toSourceFailure } from "./errors";
import { PREMIUM_RESEARCH_SOURCE_ID } from "./sources/premiumResearchSource";

export type ResearchAggregatorOptions = {
  /** In configuration order; outcomes keep this order. */
  sources: readonly ResearchSource[];
  capabilities: Capabilities;
  premiumSourceId?: string;
  /** Outer bound on a whole round, on top of each source's own timeout. */
  roundDeadlineMs?: number;
  now?: () => Date;
  onStateChange?: (state: AggregatorState, context: RequestContext) => void;
};

export interface ResearchAggregator {
  plan(): readonly ResearchSource[];
  aggregate(context: RequestContext): Promise<AggregateResult>;
}

function start(source: ResearchSource, context: RequestContext, signal: AbortSignal): Promise<unknown> {
  try {
    return source.invoke(context, signal);
  } catch (err) {
    return Promise.reject(err);
  }
}

async function settle(
  source: ResearchSource,
  context: RequestContext,
  controller: AbortController
): Promise<SourceOutcome> {
  // Settles early once the round gives up on this slot.
  const abandoned = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(new TimeoutError(`${source.id} abandoned by the research round`, source.timeoutMs)),
      { once: true }
    );
  });

  try {
    const payload = await withTimeout(
      Promise.race([start(source, context, controller.signal), abandoned]),
      source.timeoutMs,
      source.id
    );
    const outcome: SourceOutcome = { status: "success", source: source.id, payload };
    return Object.freeze(outcome);
  } catch (err) {
    controller.abort();
    const error = toSourceFailure(err);
    logWarn("research.source.failed", { source: source.id, kind: error.kind, error: error.message });
    const outcome: SourceOutcome = { status: "failure", source: source.id, error };
    return Object.freeze(outcome);
  }
}

function deadlineFailure(source: ResearchSource, ms: number): SourceOutcome {
  const outcome: SourceOutcome = {
    status: "failure",
    source: source.id,
    error: { kind: "timeout", message: `research round deadline of ${ms}ms exceeded` },
  };
  return Object.freeze(outcome);
}

async function joinAll(tasks: Promise<void>[], deadlineMs: number | undefined): Promise<boolean> {
  if (deadlineMs === undefined) {
    await Promise.all(tasks);
    return true;
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), deadlineMs);
  });
  try {
    return await Promise.race([Promise.all(tasks).then(() => true as const), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function createResearchAggregator(opts: ResearchAggregatorOptions): ResearchAggregator {
  const premiumSourceId = opts.premiumSourceId ?? PREMIUM_RESEARCH_SOURCE_ID;
  const now = opts.now ?? (() => new Date());

  // Capabilities are probed once per process, so the plan is fixed too.
  const planned = Object.freeze(
    opts.sources.filter((source) => !source.optional || source.isAvailable(opts.capabilities))
  );

  function notify(state: AggregatorState, context: RequestContext) {
    if (!opts.onStateChange) return;
    try {
      opts.onStateChange(state, context);
    } catch (err) {
      logError("research.state_hook.failed", err, { state });
    }
  }

  return {
    plan: () => planned,

    async aggregate(context) {
      const startedAt = Date.now();
      notify("idle", context);

      const slots: Array<SourceOutcome | undefined> = planned.map(() => undefined);
      const controllers = planned.map(() => new AbortController());
      const tasks = planned.map((source, index) =>
        settle(source, context, controllers[index]).then((outcome) => {
          slots[index] = outcome;
        })
      );
      notify("dispatched", context);

      notify("collecting", context);
      let finished = true;
      try {
        finished = await joinAll(tasks, opts.roundDeadlineMs);
      } catch (err) {
        // settle() never rejects; keep the round well-formed regardless
        logError("research.round.join_failed", err);
      }

      const outcomes = Object.freeze(
        planned.map((source, index) => {
          const outcome = slots[index];
          if (outcome) return outcome;
          controllers[index].abort();
          return deadlineFailure(source, opts.roundDeadlineMs ?? 0);
        })
      );

      const premium = outcomes.find((outcome) => outcome.source === premiumSourceId);
      const quality: ResearchQuality = premium?.status === "success" ? "comprehensive" : "basic";
      const succeeded = outcomes.filter((outcome) => outcome.status === "success").length;

      const result: AggregateResult = {
        state: "completed",
        outcomes,
        quality,
        completedAt: now().toISOString(),
      };
      notify("completed", context);

      logInfo("research.round.completed", {
        niche: context.niche,
        sources: outcomes.length,
        succeeded,
        failed: outcomes.length - succeeded,
        quality,
        deadlineHit: !finished,
        durationMs: Date.now() - startedAt,
      });
      return Object.freeze(result);
    },
  };
}
