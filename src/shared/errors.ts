/**
 * Error hierarchy for ccstatus.
 *
 * Only one path in the pipeline is fatal: stdin that cannot be read or
 * parsed. Everything else (providers, tracking files, unknown themes)
 * degrades to empty values and never surfaces as an error.
 */

/**
 * Base error class. Adds a machine-readable code and structured context.
 */
export class StatuslineError extends Error {
  /** Machine-readable error code (e.g., "INPUT_JSON") */
  readonly code: string;
  /** Structured debugging context */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'StatuslineError';
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for debug output */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Stdin could not be read, was not JSON, or did not match the input schema.
 * Codes: INPUT_READ, INPUT_JSON, INPUT_SHAPE
 */
export class InputError extends StatuslineError {
  constructor(
    message: string,
    code: string = 'INPUT_ERROR',
    context: Record<string, unknown> = {}
  ) {
    super(message, code, context);
    this.name = 'InputError';
  }
}
