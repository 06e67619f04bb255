/**
 * Error Taxonomy for Rendermark Scratch
 *
 * Every failure raised by the scratch store and its host adapters carries a
 * stable code so hosts can present errors without matching on messages.
 */

/**
 * Error codes
 */
export const ScratchErrorCode = {
  /** Two values cannot be added together */
  ARITHMETIC: 'SCRATCH_ARITHMETIC',
  /** A mapping key was used as a non-mapping, or the reverse */
  TYPE_MISMATCH: 'SCRATCH_TYPE_MISMATCH',
  /** A conflicting acquisition of a read/write guard */
  GUARD_VIOLATION: 'SCRATCH_GUARD_VIOLATION',
  /** A render scope was used after it was closed */
  SCOPE_CLOSED: 'SCRATCH_SCOPE_CLOSED',
  /** A template call passed arguments the store cannot take */
  INVALID_ARGUMENT: 'SCRATCH_INVALID_ARGUMENT',
  /** The environment holds an unusable setting */
  INVALID_CONFIG: 'SCRATCH_INVALID_CONFIG',
} as const;

export type ScratchErrorCodeValue = (typeof ScratchErrorCode)[keyof typeof ScratchErrorCode];

export class ScratchError extends Error {
  readonly code: ScratchErrorCodeValue;
  readonly details?: unknown;

  constructor(code: ScratchErrorCodeValue, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export interface ArithmeticErrorDetails {
  readonly key: string;
  readonly left: string;
  readonly right: string;
}

/**
 * Raised by accumulation when the existing value and the addend cannot be combined
 */
export class ArithmeticError extends ScratchError {
  declare readonly details: ArithmeticErrorDetails;

  constructor(details: ArithmeticErrorDetails) {
    super(
      ScratchErrorCode.ARITHMETIC,
      `Cannot add ${details.right} to ${details.left} stored at '${details.key}'`,
      details
    );
  }
}

export interface TypeMismatchErrorDetails {
  readonly key: string;
  readonly expected: string;
  readonly actual: string;
}

/**
 * Raised when mapping-shaped and non-mapping-shaped use of one key is mixed
 */
export class TypeMismatchError extends ScratchError {
  declare readonly details: TypeMismatchErrorDetails;

  constructor(details: TypeMismatchErrorDetails) {
    super(
      ScratchErrorCode.TYPE_MISMATCH,
      `Expected ${details.expected} at '${details.key}' but found ${details.actual}`,
      details
    );
  }
}

export class GuardViolationError extends ScratchError {
  constructor(requested: 'read' | 'write', held: 'read' | 'write') {
    super(
      ScratchErrorCode.GUARD_VIOLATION,
      `Cannot acquire ${requested} access while ${held} access is held`,
      { requested, held }
    );
  }
}

export class ScopeClosedError extends ScratchError {
  constructor(scopeId: string) {
    super(ScratchErrorCode.SCOPE_CLOSED, `Render scope ${scopeId} is closed`, { scopeId });
  }
}

export class ScratchArgumentError extends ScratchError {
  declare readonly details: { readonly method: string; readonly issues: readonly string[] };

  constructor(method: string, issues: readonly string[]) {
    super(
      ScratchErrorCode.INVALID_ARGUMENT,
      `Invalid arguments to ${method}: ${issues.join('; ')}`,
      { method, issues }
    );
  }
}
