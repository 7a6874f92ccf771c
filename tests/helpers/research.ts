import type {
  AggregateResult,
  Capabilities,
  RequestContext,
  ResearchSource,
  SourceOutcome,
} from "@/src/research/contracts";

export function envReader(env: Record<string, string>) {
  return (name: string): string | undefined => env[name];
}

export function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

export function rejectAfter(ms: number, err: Error): Promise<never> {
  return new Promise((_, reject) => setTimeout(() => reject(err), ms));
}

export function stubSource(
  id: string,
  behavior: (signal?: AbortSignal) => Promise<unknown>,
  opts: { optional?: boolean; timeoutMs?: number } = {}
) {
  const optional = opts.optional ?? false;
  const invoke = jest.fn((_context: RequestContext, signal?: AbortSignal) => behavior(signal));
  const source: ResearchSource = {
    id,
    optional,
    timeoutMs: opts.timeoutMs ?? 1000,
    isAvailable: (capabilities: Capabilities) => !optional || capabilities.has("premium-research"),
    invoke,
  };
  return { source, invoke };
}

export function completedResult(outcomes: SourceOutcome[], quality: AggregateResult["quality"] = "basic"): AggregateResult {
  return { state: "completed", outcomes, quality, completedAt: "2026-01-05T10:00:00.000Z" };
}

export function silenceLogs() {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
