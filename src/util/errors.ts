export type ErrorCategory = 'precondition' | 'insufficient' | 'authorization' | 'propagation' | 'arithmetic';

const CATEGORY = {
  ZeroAmount: 'precondition',
  LoanNotFound: 'precondition',
  LoanNotPending: 'precondition',
  LoanNotActive: 'precondition',
  LoanNotOverdue: 'precondition',
  AlreadyResolved: 'precondition',
  RelationshipNotFound: 'precondition',
  DuplicateVouch: 'precondition',
  InvalidRepaymentAmount: 'precondition',
  InvalidValue: 'precondition',
  ReentrantCall: 'precondition',

  InsufficientStars: 'insufficient',
  InsufficientStakedStars: 'insufficient',
  NotEnoughStars: 'insufficient',
  NotEnoughCapital: 'insufficient',
  ExposureCapExceeded: 'insufficient',
  UnavailableFunds: 'insufficient',
  InsufficientReputation: 'insufficient',
  InsufficientVouches: 'insufficient',
  InsufficientBalance: 'insufficient',

  Unauthorized: 'authorization',
  NotAdmin: 'authorization',

  DisbursementFailed: 'propagation',
  SlashFailed: 'propagation',
  ResolveFailed: 'propagation',
  RepaymentFailed: 'propagation',
  TransactionFailed: 'propagation',

  Overflow: 'arithmetic',
} as const satisfies Record<string, ErrorCategory>;

export type ErrorCode = keyof typeof CATEGORY;

export class ProtocolError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(code, options);
    this.name = 'ProtocolError';
    this.code = code;
    this.category = CATEGORY[code];
    this.details = details;
  }

  /** Insufficient-resource failures may succeed later once state elsewhere changes. */
  get retryable(): boolean {
    return this.category === 'insufficient';
  }
}

export function isProtocolError(err: unknown, code?: ErrorCode): err is ProtocolError {
  if (!(err instanceof ProtocolError)) return false;
  return code === undefined || err.code === code;
}

/**
 * Runs `fn` and rethrows any failure as `code`, keeping the original as `cause`.
 * Used where a composite operation surfaces a dependency's error.
 */
export function wrapFailure<T>(code: ErrorCode, details: Record<string, unknown>, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new ProtocolError(code, details, { cause: err });
  }
}
