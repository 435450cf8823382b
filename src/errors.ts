const MAX_PAYLOAD_CHARS = 200;

export function describePayload(payload: unknown): string {
  if (payload === undefined) return "";
  let text: string;
  if (typeof payload === "string") {
    text = payload;
  } else {
    try {
      text = JSON.stringify(payload);
    } catch {
      text = String(payload);
    }
  }
  return text.length > MAX_PAYLOAD_CHARS ? `${text.slice(0, MAX_PAYLOAD_CHARS)}…` : text;
}

/** Base for every failure the sync pipeline reports; `payload` is the remote response, when there was one. */
export class SyncError extends Error {
  readonly payload?: unknown;

  constructor(message: string, payload?: unknown) {
    const detail = describePayload(payload);
    super(detail ? `${message}: ${detail}` : message);
    this.name = new.target.name;
    this.payload = payload;
  }
}

export type AuthErrorKind = "SessionExpired" | "BadCredentials" | "BadCaptcha" | "Unknown";

export class AuthError extends SyncError {
  constructor(
    readonly kind: AuthErrorKind,
    message: string,
    payload?: unknown
  ) {
    super(message, payload);
  }

  get retryable(): boolean {
    return this.kind === "BadCredentials" || this.kind === "BadCaptcha";
  }
}

export type TokenErrorKind = "SessionExpired" | "Rejected";

export class TokenError extends SyncError {
  constructor(
    readonly kind: TokenErrorKind,
    message: string,
    payload?: unknown
  ) {
    super(message, payload);
  }
}

export type TransportErrorKind = "HTTPStatus" | "Timeout" | "Network";

export class TransportError extends SyncError {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    readonly status?: number,
    payload?: unknown
  ) {
    super(message, payload);
  }

  static fromCause(label: string, cause: unknown): TransportError {
    const message = cause instanceof Error ? cause.message : String(cause);
    const kind: TransportErrorKind = /timeout|timed out/i.test(message) ? "Timeout" : "Network";
    return new TransportError(kind, `${label} failed: ${message}`);
  }
}

/** The remote answered, but not in the shape this client relies on. */
export class DataShapeError extends SyncError {}

export class DownloadAgentError extends SyncError {
  constructor(
    message: string,
    readonly exitCode: number | null
  ) {
    super(message);
  }
}
