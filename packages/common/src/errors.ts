export type FramingRejectReason = "too_short" | "length_mismatch" | "unknown_channel";

export class FramingError extends Error {
  readonly reason: FramingRejectReason;

  constructor(reason: FramingRejectReason, message: string) {
    super(message);
    this.name = "FramingError";
    this.reason = reason;
  }
}

export class CodecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
  }
}

/** Sender and receiver disagree on the wire layout. Never recoverable. */
export class ProtocolMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolMismatchError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
