export type ErrorKind = 'authorization' | 'state' | 'timing' | 'validation' | 'configuration';

/**
 * Stable rejection codes, grouped by kind
 */
export const ERROR_CODES = {
  // authorization
  NOT_OWNER_OR_SELF: 'authorization',
  NOT_SELF: 'authorization',
  NOT_GUARDIAN_OR_SELF: 'authorization',
  NOT_AUTHORISED_MODULE: 'authorization',
  NOT_REGISTRY_OWNER: 'authorization',
  NOT_REGISTRY_MANAGER: 'authorization',
  INVALID_SIGNATURES: 'authorization',
  INVALID_SESSION: 'authorization',
  CALL_NOT_AUTHORISED: 'authorization',
  REFUND_NOT_AUTHORISED: 'authorization',
  // state
  WALLET_LOCKED: 'state',
  WALLET_UNLOCKED: 'state',
  LOCK_NOT_MANUAL: 'state',
  RECOVERY_IN_PROGRESS: 'state',
  NO_RECOVERY_IN_PROGRESS: 'state',
  UNKNOWN_PENDING_CHANGE: 'state',
  DUPLICATE_PENDING_CHANGE: 'state',
  NO_GUARDIANS: 'state',
  LOCKED_WALLET_REFUND: 'state',
  INVALID_NONCE: 'state',
  NO_PENDING_FILTER_UPDATE: 'state',
  NO_PENDING_TIMELOCK_CHANGE: 'state',
  REFUND_FAILED: 'state',
  // timing
  PENDING_CHANGE_NOT_OVER: 'timing',
  PENDING_CHANGE_EXPIRED: 'timing',
  RECOVERY_PERIOD_NOT_OVER: 'timing',
  FILTER_UPDATE_NOT_READY: 'timing',
  TIMELOCK_CHANGE_NOT_READY: 'timing',
  // validation
  NULL_ADDRESS: 'validation',
  GUARDIAN_IS_OWNER: 'validation',
  GUARDIAN_IS_SESSION_KEY: 'validation',
  DUPLICATE_GUARDIAN: 'validation',
  NOT_A_GUARDIAN: 'validation',
  GUARDIAN_PROBE_FAILED: 'validation',
  NEW_OWNER_IS_GUARDIAN: 'validation',
  UNKNOWN_OPERATION: 'validation',
  MALFORMED_OPERATION: 'validation',
  MALFORMED_CALL_DATA: 'validation',
  WALLET_MISMATCH: 'validation',
  WRONG_SIGNATURE_COUNT: 'validation',
  UNKNOWN_REGISTRY: 'validation',
  DUPLICATE_REGISTRY: 'validation',
  INVALID_REGISTRY_ID: 'validation',
  REGISTRY_ALREADY_TOGGLED: 'validation',
  DUPLICATE_DAPP: 'validation',
  UNKNOWN_DAPP: 'validation',
  CANNOT_WHITELIST_WALLET: 'validation',
  CANNOT_WHITELIST_MODULE: 'validation',
  ALREADY_WHITELISTED: 'validation',
  UNREGISTERED_MODULE: 'validation',
  INVALID_SESSION_KEY: 'validation',
  INVALID_SESSION_DURATION: 'validation',
  VALUE_TO_SPENDER: 'validation',
  // configuration
  INVALID_CONFIG: 'configuration',
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Rejection raised by any module operation. Nothing has been applied when it is
 * thrown, except for `REFUND_FAILED`, which follows the relayed operation.
 */
export class WalletModuleError extends Error {
  readonly kind: ErrorKind;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'WalletModuleError';
    this.kind = ERROR_CODES[code];
  }
}

export function isWalletModuleError(error: unknown, code?: ErrorCode): error is WalletModuleError {
  return error instanceof WalletModuleError && (code === undefined || error.code === code);
}
