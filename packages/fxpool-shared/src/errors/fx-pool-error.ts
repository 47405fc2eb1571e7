/**
 * FX Pool Error Taxonomy
 *
 * Every failure the engine raises is an FxPoolError subclass carrying a
 * category (`kind`) and a machine-readable `code`. Callers branch on these
 * instead of parsing messages.
 *
 * Categories:
 * - InputError: rejected before any state read
 * - OracleError: rejected during rate lookup, never retried automatically
 * - InvariantViolation: rejected mid-computation, before any mutating call
 * - SlippageViolation: detected after staged mutations, whole operation undone
 * - ArithmeticError: fixed-point overflow / division by zero
 * - LedgerError: a collaborator call was rejected
 */

export type FxPoolErrorKind =
  | 'InputError'
  | 'OracleError'
  | 'InvariantViolation'
  | 'SlippageViolation'
  | 'ArithmeticError'
  | 'LedgerError';

export type InputErrorCode =
  | 'ZeroAddress'
  | 'AmountMustBePositive'
  | 'TokenMismatch'
  | 'InvalidPoolParameters'
  | 'UnknownPool'
  | 'InvalidSlippage';

export type OracleErrorCode =
  | 'StalePrice'
  | 'StaleOraclePrice'
  | 'ZeroOrNegativePrice'
  | 'OracleRoundIncomplete'
  | 'RateUnavailable'
  | 'OracleClientUnavailable';

export type InvariantViolationCode =
  | 'PoolNotLiquid'
  | 'BaseBalanceViolation'
  | 'QuoteBalanceViolation'
  | 'ZeroBaseBalance'
  | 'LiquidityInvariantViolation'
  | 'ReentrantCall'
  | 'AssimilatorAlreadyRegistered'
  | 'TemplateAlreadyRecorded'
  | 'InvalidPlanState';

export type SlippageViolationCode =
  | 'ExpectedSharesViolation'
  | 'MaxAmountInViolation'
  | 'MinAmountOutViolation'
  | 'SwapOutputViolation';

export type ArithmeticErrorCode = 'ArithmeticOverflow' | 'DivisionByZero';

export type LedgerErrorCode = 'LedgerCallFailed';

export type FxPoolErrorCode =
  | InputErrorCode
  | OracleErrorCode
  | InvariantViolationCode
  | SlippageViolationCode
  | ArithmeticErrorCode
  | LedgerErrorCode;

/**
 * Base class for all engine failures
 */
export abstract class FxPoolError extends Error {
  abstract readonly kind: FxPoolErrorKind;
  abstract readonly code: FxPoolErrorCode;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    public override readonly cause?: unknown
  ) {
    super(message);
  }
}

export class InputError extends FxPoolError {
  readonly kind = 'InputError' as const;

  constructor(
    public readonly code: InputErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'InputError';
  }
}

export class OracleError extends FxPoolError {
  readonly kind = 'OracleError' as const;

  constructor(
    public readonly code: OracleErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, details, cause);
    this.name = 'OracleError';
  }
}

export class InvariantViolation extends FxPoolError {
  readonly kind = 'InvariantViolation' as const;

  constructor(
    public readonly code: InvariantViolationCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'InvariantViolation';
  }
}

export class SlippageViolation extends FxPoolError {
  readonly kind = 'SlippageViolation' as const;

  constructor(
    public readonly code: SlippageViolationCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'SlippageViolation';
  }
}

export class ArithmeticError extends FxPoolError {
  readonly kind = 'ArithmeticError' as const;

  constructor(
    public readonly code: ArithmeticErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ArithmeticError';
  }
}

export class LedgerError extends FxPoolError {
  readonly kind = 'LedgerError' as const;
  readonly code = 'LedgerCallFailed' as const;

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, details, cause);
    this.name = 'LedgerError';
  }
}

/**
 * Type guard for engine failures
 */
export function isFxPoolError(error: unknown): error is FxPoolError {
  return error instanceof FxPoolError;
}
