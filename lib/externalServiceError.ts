export type ExternalProvider = "parallel-ai" | "apify" | "unknown";

export class ExternalServiceError extends Error {
  provider: ExternalProvider;
  status?: number;
  retryable: boolean;
  rawSnippet?: string;

  constructor(opts: {
    provider: ExternalProvider;
    message: string;
    status?: number;
    retryable: boolean;
    rawSnippet?: string;
  }) {
    super(opts.message);
    this.name = "ExternalServiceError";
    this.provider = opts.provider;
    this.status = opts.status;
    this.retryable = opts.retryable;
    this.rawSnippet = opts.rawSnippet;

    // Ensure fields survive structured cloning/logging in some runtimes
    Object.defineProperty(this, "provider", { enumerable: true, value: this.provider });
    Object.defineProperty(this, "status", { enumerable: true, value: this.status });
    Object.defineProperty(this, "retryable", { enumerable: true, value: this.retryable });
    Object.defineProperty(this, "rawSnippet", { enumerable: true, value: this.rawSnippet });
  }
}

/** The upstream answered, but not with a body we can interpret. */
export class ResponseFormatError extends Error {
  provider: ExternalProvider;

  constructor(provider: ExternalProvider, message: string) {
    super(message);
    this.name = "ResponseFormatError";
    this.provider = provider;
  }
}

export function isRetryableStatus(status: number) {
  return status === 429 || status >= 500;
}

export async function toExternalServiceError(
  provider: ExternalProvider,
  label: string,
  res: Response
): Promise<ExternalServiceError> {
  const body = await res.text().catch(() => "");
  return new ExternalServiceError({
    provider,
    message: `${label} failed (${res.status})`,
    status: res.status,
    retryable: isRetryableStatus(res.status),
    rawSnippet: body.slice(0, 200),
  });
}
