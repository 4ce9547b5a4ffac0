/**
 * Errors raised by feed pipes. Every failure the uniq stage can signal is a
 * PipeError carrying a stable code so callers can branch without parsing
 * messages.
 */

export type PipeErrorCode = "CONFIGURATION_ERROR" | "KEY_EXTRACTION_ERROR" | "INPUT_TYPE_ERROR";

export interface PipeErrorOptions {
  message?: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export interface PipeErrorJSON {
  name: string;
  code: PipeErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: string;
}

type ErrorConstructorFn = abstract new (...args: never[]) => unknown;
type CaptureStackTraceFn = (target: Error, ctor?: ErrorConstructorFn) => void;

export class PipeError extends Error {
  public readonly code: PipeErrorCode;
  public override readonly cause?: unknown;
  public readonly details?: Record<string, unknown>;

  constructor(code: PipeErrorCode, opts: PipeErrorOptions = {}) {
    super(opts.message ?? code);

    this.name = new.target.name;
    this.code = code;
    this.cause = opts.cause;
    this.details = opts.details;

    const captureStackTrace = (Error as { captureStackTrace?: CaptureStackTraceFn }).captureStackTrace;
    if (captureStackTrace) {
      captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): PipeErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: formatCause(this.cause),
    };
  }
}

/** The pipe configuration cannot be resolved to a usable value. */
export class ConfigurationError extends PipeError {
  constructor(message = "Invalid pipe configuration", opts: Omit<PipeErrorOptions, "message"> = {}) {
    super("CONFIGURATION_ERROR", { message, ...opts });
  }
}

export class KeyExtractionError extends PipeError {
  public readonly index: number;
  public readonly field: string;

  constructor(index: number, field: string, reason: string, opts: Omit<PipeErrorOptions, "message"> = {}) {
    super("KEY_EXTRACTION_ERROR", {
      message: `key extraction must yield a hashable/comparable value: item ${index} field "${field}" ${reason}`,
      ...opts,
      details: { index, field, reason, ...opts.details },
    });
    this.index = index;
    this.field = field;
  }
}

/** A feed element is not a field mapping. */
export class InputTypeError extends PipeError {
  public readonly index?: number;

  constructor(message: string, index?: number, opts: Omit<PipeErrorOptions, "message"> = {}) {
    super("INPUT_TYPE_ERROR", {
      message,
      ...opts,
      details: index === undefined ? opts.details : { index, ...opts.details },
    });
    this.index = index;
  }
}

export function isPipeError(err: unknown): err is PipeError {
  return err instanceof PipeError;
}

function formatCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
