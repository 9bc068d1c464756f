/**
 * Every way a call to the generation service can fail.
 * The CLI prints `message` as-is, so it must never contain the API key.
 */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class TransportError extends GenerationError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not reach the Gemini API: ${reason}`, { cause });
    this.name = "TransportError";
  }
}

export class ServiceError extends GenerationError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Gemini API returned HTTP ${status}:\n${body}`);
    this.name = "ServiceError";
    this.status = status;
    this.body = body;
  }
}

export class MalformedResponseError extends GenerationError {
  readonly raw: unknown;

  constructor(raw: unknown) {
    super(
      `Could not extract message from API response. Full response:\n${renderRaw(raw)}`
    );
    this.name = "MalformedResponseError";
    this.raw = raw;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function renderRaw(raw: unknown): string {
  try {
    // JSON.stringify returns undefined for undefined and functions
    return JSON.stringify(raw) ?? String(raw);
  } catch {
    // BigInt and circular values cannot be serialized
    return String(raw);
  }
}
