export type LedgerErrorKind =
  | 'Unauthorized'
  | 'InvalidState'
  | 'InvalidAmount'
  | 'NothingToClaim'
  | 'TransferFailed';

const KIND_BY_CODE = {
  'not-owner': 'Unauthorized',
  'not-accepting-contributions': 'InvalidState',
  'cannot-cancel': 'InvalidState',
  'cannot-withdraw': 'InvalidState',
  'cannot-refund': 'InvalidState',
  'contribution-too-small': 'InvalidAmount',
  'invalid-withdrawal-amount': 'InvalidAmount',
  'insufficient-funds': 'InvalidAmount',
  'invalid-goal': 'InvalidAmount',
  'nothing-to-claim': 'NothingToClaim',
  'transfer-failed': 'TransferFailed',
} as const satisfies Record<string, LedgerErrorKind>;

export type LedgerErrorCode = keyof typeof KIND_BY_CODE;

export type LedgerErrorDetails = Record<string, string>;

/**
 * Failure of a ledger operation. The message is the kebab-case code so it can
 * be returned to API callers unchanged.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly kind: LedgerErrorKind;
  readonly details: LedgerErrorDetails;

  constructor(code: LedgerErrorCode, details: LedgerErrorDetails = {}, options?: { cause?: unknown }) {
    super(code, options);
    this.name = 'LedgerError';
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.details = details;
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
