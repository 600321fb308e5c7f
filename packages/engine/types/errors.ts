// Engine error taxonomy
// `userMessage` is the only text a caller surface may show; it never names
// other customers, row counts outside the caller's scope, or internal structures.

export type EngineErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'UNKNOWN_CUSTOMER'
  | 'UNSUPPORTED_PLAN'
  | 'UNKNOWN_COLUMN'
  | 'PLANNER_UNAVAILABLE'
  | 'COMPOSER_UNAVAILABLE'
  | 'FORBIDDEN_OPERATION'
  | 'REQUEST_CANCELLED';

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly userMessage: string,
    public readonly fatal: boolean = true,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EngineError';
  }
}

export class DataUnavailable extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('DATA_UNAVAILABLE', message, 'Data is temporarily unavailable. Please try again.', true, cause);
    this.name = 'DataUnavailable';
  }
}

export class UnknownCustomer extends EngineError {
  constructor() {
    super('UNKNOWN_CUSTOMER', 'Customer identity is not recognised', 'Access denied for this account.');
    this.name = 'UnknownCustomer';
  }
}

export type PlanRejectionKind = 'grammar' | 'table' | 'join' | 'operator' | 'role' | 'shape';

export class UnsupportedPlan extends EngineError {
  constructor(
    message: string,
    public readonly kind: PlanRejectionKind = 'grammar',
  ) {
    super('UNSUPPORTED_PLAN', message, "I can't answer that with the available data.", false);
    this.name = 'UnsupportedPlan';
  }
}

export class UnknownColumn extends EngineError {
  constructor(public readonly column: string) {
    super('UNKNOWN_COLUMN', `Unknown column "${column}"`, "I can't answer that with the available data.", false);
    this.name = 'UnknownColumn';
  }
}

export class PlannerUnavailable extends EngineError {
  constructor(cause?: unknown) {
    super(
      'PLANNER_UNAVAILABLE',
      `Planner service failed: ${describeCause(cause)}`,
      'The assistant is unavailable right now. Please try again later.',
      true,
      cause,
    );
    this.name = 'PlannerUnavailable';
  }
}

export class ComposerUnavailable extends EngineError {
  constructor(cause?: unknown) {
    super(
      'COMPOSER_UNAVAILABLE',
      `Composer service failed: ${describeCause(cause)}`,
      'The assistant is unavailable right now. Please try again later.',
      true,
      cause,
    );
    this.name = 'ComposerUnavailable';
  }
}

export class ForbiddenOperation extends EngineError {
  constructor(operation: string) {
    super('FORBIDDEN_OPERATION', `Operation "${operation}" requires the business role`, 'This request is not available for your account.');
    this.name = 'ForbiddenOperation';
  }
}

export class RequestCancelled extends EngineError {
  constructor(public readonly stage: string) {
    super('REQUEST_CANCELLED', `Request cancelled before stage "${stage}"`, 'The request was cancelled.');
    this.name = 'RequestCancelled';
  }
}

/** Plan failures are recovered by falling back, never by executing the plan */
export function isPlanRejection(err: unknown): err is UnsupportedPlan | UnknownColumn {
  return err instanceof UnsupportedPlan || err instanceof UnknownColumn;
}

export function toUserMessage(err: unknown): string {
  if (err instanceof EngineError) return err.userMessage;
  return 'Something went wrong while answering. Please try again.';
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return 'unknown error';
  return cause instanceof Error ? cause.message : String(cause);
}
