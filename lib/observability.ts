export type LogContext = Record<string, unknown>;

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function logInfo(event: string, ctx: LogContext = {}) {
  console.log(
    JSON.stringify({ level: "info", event, ts: new Date().toISOString(), ...ctx })
  );
}

export function logWarn(event: string, ctx: LogContext = {}) {
  console.warn(
    JSON.stringify({ level: "warn", event, ts: new Date().toISOString(), ...ctx })
  );
}

export function logError(event: string, err: unknown, ctx: LogContext = {}) {
  console.error(
    JSON.stringify({
      level: "error",
      event,
      ts: new Date().toISOString(),
      error: errorMessage(err),
      ...ctx,
    })
  );
}
