import { ZodError } from "zod";
import { ConfigError } from "@/lib/configGuard";
import { TimeoutError } from "@/lib/externalCallGuard";
import { ExternalServiceError, ResponseFormatError } from "@/lib/externalServiceError";
import { FetchTimeoutError } from "@/lib/httpFetch";
import { errorMessage } from "@/lib/observability";
import type { SourceFailure } from "./contracts";

export type FailureKind = "network" | "auth" | "timeout" | "upstream_format";

/** Thrown by sources that already know which kind of failure they hit. */
export class ResearchSourceError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = "ResearchSourceError";
    this.kind = kind;
  }
}

export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof ResearchSourceError) return err.kind;
  if (err instanceof TimeoutError || err instanceof FetchTimeoutError) return "timeout";
  if (
    err instanceof ResponseFormatError ||
    err instanceof ZodError ||
    err instanceof SyntaxError
  ) {
    return "upstream_format";
  }
  if (err instanceof ExternalServiceError) {
    return err.status === 401 || err.status === 403 ? "auth" : "network";
  }
  // a source invoked without its credential
  if (err instanceof ConfigError) return "auth";
  return "network";
}

export function toSourceFailure(err: unknown): SourceFailure {
  const failure: SourceFailure = { kind: classifyFailure(err), message: errorMessage(err) };
  return Object.freeze(failure);
}
