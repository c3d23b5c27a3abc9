import type { ContentType, Language, Tone } from "../types/index.js";

export class InvalidRequestError extends Error {
  readonly productId: string;
  readonly attribute: string;

  constructor(productId: string, attribute: string, contentType: ContentType) {
    super(`Product ${productId} is missing "${attribute}", required for ${contentType} content`);
    this.name = "InvalidRequestError";
    this.productId = productId;
    this.attribute = attribute;
  }
}

export type RemoteFailureClass = "transient" | "terminal";

export class RemoteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteError";
  }
}

export class RemoteHttpError extends RemoteError {
  readonly status: number;
  readonly retryAfterMs?: number;

  constructor(status: number, message: string, retryAfterMs?: number) {
    super(`HTTP ${status}: ${message}`);
    this.name = "RemoteHttpError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export class RemoteTimeoutError extends RemoteError {
  readonly timeoutMs?: number;

  constructor(timeoutMs?: number) {
    super(timeoutMs === undefined ? "Remote request timed out" : `Remote request timed out after ${timeoutMs}ms`);
    this.name = "RemoteTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteNetworkError extends RemoteError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Network error: ${message}`, options);
    this.name = "RemoteNetworkError";
  }
}

/** The endpoint answered, but the body carried no completion. */
export class MalformedResponseError extends RemoteError {
  constructor(message: string) {
    super(`Malformed response: ${message}`);
    this.name = "MalformedResponseError";
  }
}

/** A completion came back but is too short or has no words in it. */
export class UnusableResponseError extends RemoteError {
  constructor(reason: string) {
    super(`Unusable response: ${reason}`);
    this.name = "UnusableResponseError";
  }
}

export function classifyRemoteError(error: unknown): RemoteFailureClass {
  if (error instanceof RemoteHttpError) {
    return error.status === 429 || error.status >= 500 ? "transient" : "terminal";
  }
  if (
    error instanceof RemoteTimeoutError ||
    error instanceof RemoteNetworkError ||
    error instanceof UnusableResponseError
  ) {
    return "transient";
  }
  return "terminal";
}

export class FallbackExhaustionError extends Error {
  constructor(contentType: ContentType, tone: Tone, language: Language) {
    super(`No fallback template for ${contentType}/${tone}/${language}`);
    this.name = "FallbackExhaustionError";
  }
}

export class CatalogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
