/**
 * Ledger Error Definitions
 *
 * Every failure raised by the account, codec and proof packages carries one of
 * four kinds so callers can report bad data, authorization failures and
 * absence as separate categories.
 */

export enum LedgerErrorKind {
  /** Unknown tag, truncated bit stream or counter overflow */
  MALFORMED_INPUT = 'MALFORMED_INPUT',
  /** StateInit does not match the commitment it must activate */
  POLICY_VIOLATION = 'POLICY_VIOLATION',
  /** Address absent under the given root or outside its shard */
  NOT_FOUND = 'NOT_FOUND',
  /** Operation invoked on a value that cannot support it */
  PRECONDITION_VIOLATION = 'PRECONDITION_VIOLATION',
}

/**
 * Codec error codes
 */
export const CODEC_ERRORS = {
  WRONG_ACCOUNT_TAG: 'wrong_account_tag',
  WRONG_STORAGE_EXTRA_TAG: 'wrong_storage_extra_tag',
  WRONG_ADDRESS_TAG: 'wrong_address_tag',
  WRONG_SHARD_STATE_TAG: 'wrong_shard_state_tag',
  WRONG_SHARD_IDENT_TAG: 'wrong_shard_ident_tag',
  VAR_UINT_LENGTH: 'var_uint_length',
  VALUE_OUT_OF_RANGE: 'value_out_of_range',
  TRUNCATED: 'truncated',
  ENCODE_FAILED: 'encode_failed',
} as const

/**
 * Account state machine error codes
 */
export const ACCOUNT_ERRORS = {
  STATE_INIT_ADDRESS_MISMATCH: 'state_init_address_mismatch',
  STATE_INIT_FROZEN_HASH_MISMATCH: 'state_init_frozen_hash_mismatch',
  ACCOUNT_NONE: 'account_none',
  STORAGE_COUNTER_OVERFLOW: 'storage_counter_overflow',
} as const

/**
 * Proof extraction error codes
 */
export const PROOF_ERRORS = {
  ACCOUNT_NOT_IN_SHARD: 'account_not_in_shard',
  ACCOUNT_NOT_FOUND: 'account_not_found',
  ROOT_NOT_VISITED: 'root_not_visited',
  NOT_A_MERKLE_PROOF: 'not_a_merkle_proof',
  PROOF_HASH_MISMATCH: 'proof_hash_mismatch',
} as const

export type CodecErrorCode = (typeof CODEC_ERRORS)[keyof typeof CODEC_ERRORS]
export type AccountErrorCode =
  (typeof ACCOUNT_ERRORS)[keyof typeof ACCOUNT_ERRORS]
export type ProofErrorCode = (typeof PROOF_ERRORS)[keyof typeof PROOF_ERRORS]

export type LedgerErrorCode = CodecErrorCode | AccountErrorCode | ProofErrorCode

export class LedgerError extends Error {
  constructor(
    message: string,
    public kind: LedgerErrorKind,
    public code: LedgerErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'LedgerError'
  }
}

export class DecodeError extends LedgerError {
  constructor(
    message: string,
    code: CodecErrorCode | ProofErrorCode = CODEC_ERRORS.TRUNCATED,
    context?: Record<string, unknown>,
  ) {
    super(message, LedgerErrorKind.MALFORMED_INPUT, code, context)
    this.name = 'DecodeError'
  }
}

export class EncodeError extends LedgerError {
  constructor(
    message: string,
    code: CodecErrorCode = CODEC_ERRORS.ENCODE_FAILED,
    context?: Record<string, unknown>,
  ) {
    super(message, LedgerErrorKind.MALFORMED_INPUT, code, context)
    this.name = 'EncodeError'
  }
}

export class StorageOverflowError extends LedgerError {
  constructor(
    message: string,
    public cells: bigint,
    public bits: bigint,
  ) {
    super(
      message,
      LedgerErrorKind.MALFORMED_INPUT,
      ACCOUNT_ERRORS.STORAGE_COUNTER_OVERFLOW,
      { cells, bits },
    )
    this.name = 'StorageOverflowError'
  }
}

export class ActivationError extends LedgerError {
  constructor(
    message: string,
    code: AccountErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, LedgerErrorKind.POLICY_VIOLATION, code, context)
    this.name = 'ActivationError'
  }
}

export class NotFoundError extends LedgerError {
  constructor(
    message: string,
    code: ProofErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, LedgerErrorKind.NOT_FOUND, code, context)
    this.name = 'NotFoundError'
  }
}

export class PreconditionError extends LedgerError {
  constructor(
    message: string,
    code: AccountErrorCode | ProofErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, LedgerErrorKind.PRECONDITION_VIOLATION, code, context)
    this.name = 'PreconditionError'
  }
}
