/**
 * Error taxonomy for Retention PDP.
 *
 * Every failure surfaced by the engine is an EngineError with a stable code,
 * so callers (transport adapters, the CLI) can map it without string matching.
 */

export const ErrorCode = {
  /** Malformed policy definition or configuration, rejected at load */
  SCHEMA_INVALID: 'SCHEMA_INVALID',
  /** Malformed request context, rejected at the boundary */
  REQUEST_INVALID: 'REQUEST_INVALID',
  /** Policy lookup miss */
  POLICY_NOT_FOUND: 'POLICY_NOT_FOUND',
  /** Audit chain tamper or corruption detected */
  CHAIN_VERIFICATION_FAILED: 'CHAIN_VERIFICATION_FAILED',
  /** Deletion hook failed for a duty */
  DUTY_EXECUTION_FAILED: 'DUTY_EXECUTION_FAILED',
  /** Audit writer observed a sequence it did not produce; fatal to the writer */
  CONCURRENT_WRITE_CONFLICT: 'CONCURRENT_WRITE_CONFLICT',
  /** Duty lifecycle transition not allowed from the current state */
  INVALID_TRANSITION: 'INVALID_TRANSITION',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class EngineError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
  }
}

export class SchemaInvalidError extends EngineError {
  readonly errors: readonly string[];

  constructor(subject: string, errors: readonly string[]) {
    super(ErrorCode.SCHEMA_INVALID, `Invalid ${subject}: ${errors.join('; ')}`);
    this.name = 'SchemaInvalidError';
    this.errors = errors;
  }
}

export class RequestInvalidError extends EngineError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(ErrorCode.REQUEST_INVALID, `Invalid request context: ${errors.join('; ')}`);
    this.name = 'RequestInvalidError';
    this.errors = errors;
  }
}

export class PolicyNotFoundError extends EngineError {
  readonly policyId: string;

  constructor(policyId: string) {
    super(ErrorCode.POLICY_NOT_FOUND, `Policy not found: ${policyId}`);
    this.name = 'PolicyNotFoundError';
    this.policyId = policyId;
  }
}

export class ChainVerificationFailedError extends EngineError {
  /** Index of the first entry whose recomputed hash or link diverges */
  readonly index: number;

  constructor(index: number, reason: string) {
    super(
      ErrorCode.CHAIN_VERIFICATION_FAILED,
      `Audit chain verification failed at entry ${index}: ${reason}`
    );
    this.name = 'ChainVerificationFailedError';
    this.index = index;
  }
}

export class DutyExecutionFailedError extends EngineError {
  readonly dutyId: string;
  readonly attempt: number;

  constructor(dutyId: string, attempt: number, cause: unknown) {
    super(
      ErrorCode.DUTY_EXECUTION_FAILED,
      `Deletion hook failed for duty ${dutyId} (attempt ${attempt}): ${describeError(cause)}`,
      { cause }
    );
    this.name = 'DutyExecutionFailedError';
    this.dutyId = dutyId;
    this.attempt = attempt;
  }
}

export class ConcurrentWriteConflictError extends EngineError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      ErrorCode.CONCURRENT_WRITE_CONFLICT,
      `Audit storage expected sequence ${expected} but received ${actual}`
    );
    this.name = 'ConcurrentWriteConflictError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(subject: string, from: string, to: string, allowed: readonly string[]) {
    super(
      ErrorCode.INVALID_TRANSITION,
      `Invalid ${subject} transition: ${from} → ${to}. Valid transitions: ${allowed.join(', ') || 'none'}`
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Render any thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
