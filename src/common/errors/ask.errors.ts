export type AskErrorKind = 'ValidationError' | 'RetrievalError' | 'GenerationError';

/**
 * Base class for failures reported to the caller of `POST /ask`.
 * `kind` is the value of the `error` field in the JSON body.
 */
export abstract class AskError extends Error {
  abstract readonly kind: AskErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AskError {
  readonly kind = 'ValidationError';
  readonly status = 400;
}

/**
 * Failure of an outbound collaborator. Timeouts map to 504, everything else to 502.
 */
abstract class UpstreamError extends AskError {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.timedOut = options.timedOut ?? false;
  }

  get status(): number {
    return this.timedOut ? 504 : 502;
  }
}

export class RetrievalError extends UpstreamError {
  readonly kind = 'RetrievalError';
}

export class GenerationError extends UpstreamError {
  readonly kind = 'GenerationError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
