export type FeedErrorKind = "transport" | "server" | "parse";

export abstract class FeedError extends Error {
  abstract readonly kind: FeedErrorKind;

  /** Short tag used in diagnostics, e.g. `ServerError(500)`. */
  label(): string {
    return this.name;
  }
}

export class TransportError extends FeedError {
  readonly kind = "transport";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ServerError extends FeedError {
  readonly kind = "server";

  constructor(readonly statusCode: number) {
    super(`Feed responded with ${statusCode}`);
    this.name = "ServerError";
  }

  override label(): string {
    return `${this.name}(${this.statusCode})`;
  }
}

export class ParseError extends FeedError {
  readonly kind = "parse";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

export class StateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateError";
  }
}

// Raw response sink is unavailable; not recoverable.
export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkError";
  }
}

export function isFeedError(error: unknown): error is FeedError {
  return error instanceof FeedError;
}

export function stringifyError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
