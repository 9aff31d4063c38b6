import type { Address, Hex } from 'viem';

/**
 * Who, besides guardians, may sign a relayed operation
 */
export enum OwnerSignature {
  /** No signature is needed; anyone may submit */
  Anyone = 0,
  /** The first signature must come from the owner */
  Required = 1,
  /** The first signature may come from the owner */
  Optional = 2,
  /** Only guardians may sign */
  Disallowed = 3,
  /** A standing session key (or the owner) signs */
  Session = 4,
}

/**
 * Host-supplied context of a single call into the module
 */
export interface CallContext {
  /** Address that submitted the call */
  sender: Address;
  /** Gas price paid by the submitter; caps ETH refunds */
  gasPrice?: bigint;
  /** Remaining gas as reported by the host, used to measure refunds */
  gasLeft?: () => bigint;
}

/**
 * A single outgoing call made by the wallet
 */
export interface Call {
  to: Address;
  value: bigint;
  data: Hex;
}

/**
 * An entry of a batched call payload
 */
export interface BatchedCall extends Call {
  /** When set, the effective spender is decoded from `data` */
  isSpenderInData: boolean;
}

/**
 * Delegated signer with an expiry (unix seconds). A zero expiry is never stored.
 */
export interface Session {
  key: Address;
  expires: bigint;
}

export type LockOrigin = 'recovery' | 'manual';

/**
 * Lock state of a wallet; `releaseAfter === 0n` means unlocked
 */
export interface Lock {
  releaseAfter: bigint;
  locker: LockOrigin | null;
}

/**
 * Ownership recovery in flight
 */
export interface RecoveryConfig {
  /** The proposed new owner */
  recovery: Address;
  /** Timestamp after which the recovery can be finalized */
  executeAfter: bigint;
  /** Guardian count when the recovery started */
  guardianCount: number;
}

export type GuardianChangeDirection = 'addition' | 'revocation';

/**
 * Module timing parameters, in seconds
 */
export interface SecurityParameters {
  /** Delay before a guardian change or whitelist entry takes effect */
  securityPeriod: bigint;
  /** Window after the security period during which a change can be confirmed */
  securityWindow: bigint;
  /** Duration of a lock */
  lockPeriod: bigint;
  /** Delay before a recovery can be finalized */
  recoveryPeriod: bigint;
}

/**
 * Every operation that can be relayed, keyed by kind
 */
export type Operation =
  | { kind: 'multiCall'; wallet: Address; calls: BatchedCall[] }
  | { kind: 'multiCallWithSession'; wallet: Address; session: Session; calls: BatchedCall[] }
  | { kind: 'multiCallWithGuardians'; wallet: Address; calls: BatchedCall[] }
  | {
      kind: 'multiCallWithGuardiansAndStartSession';
      wallet: Address;
      calls: BatchedCall[];
      sessionUser: Address;
      duration: bigint;
    }
  | { kind: 'addToWhitelist'; wallet: Address; target: Address }
  | { kind: 'removeFromWhitelist'; wallet: Address; target: Address }
  | { kind: 'addModule'; wallet: Address; module: Address }
  | { kind: 'clearSession'; wallet: Address }
  | { kind: 'addGuardian'; wallet: Address; guardian: Address }
  | { kind: 'revokeGuardian'; wallet: Address; guardian: Address }
  | { kind: 'cancelGuardianAddition'; wallet: Address; guardian: Address }
  | { kind: 'cancelGuardianRevocation'; wallet: Address; guardian: Address }
  | { kind: 'confirmGuardianAddition'; wallet: Address; guardian: Address }
  | { kind: 'confirmGuardianRevocation'; wallet: Address; guardian: Address }
  | { kind: 'executeRecovery'; wallet: Address; recovery: Address }
  | { kind: 'finalizeRecovery'; wallet: Address }
  | { kind: 'cancelRecovery'; wallet: Address }
  | { kind: 'transferOwnership'; wallet: Address; newOwner: Address }
  | { kind: 'toggleDappRegistry'; wallet: Address; registryId: number; enabled: boolean }
  | { kind: 'lock'; wallet: Address }
  | { kind: 'unlock'; wallet: Address };

export type OperationKind = Operation['kind'];

/**
 * Number of signatures and owner policy required for an operation
 */
export interface SignatureRequirement {
  count: number;
  ownerSignature: OwnerSignature;
}

/**
 * Gas refund parameters signed together with a relayed operation
 */
export interface RefundParams {
  /** Price per gas unit, in wei or in refund token units */
  gasPrice: bigint;
  /** Upper bound on refunded gas */
  gasLimit: bigint;
  /** ETH_TOKEN for ether, otherwise an ERC-20 address */
  token: Address;
  /** Recipient of the refund; the zero address means the submitter */
  recipient: Address;
}

export interface RelayRequest {
  wallet: Address;
  /** ABI-encoded operation */
  data: Hex;
  nonce: bigint;
  /** One 65-byte signature per required signer, in policy order */
  signatures: Hex[];
  refund?: RefundParams;
}

export interface RefundReceipt {
  recipient: Address;
  token: Address;
  amount: bigint;
}

export interface RelayResult {
  /** Whether the relayed operation itself executed without error */
  success: boolean;
  /** EIP-712 hash the signatures were verified against */
  signHash: Hex;
  /** Results of the wallet calls made by batch operations */
  returnData: Hex[];
  /** Rejection raised by the operation when `success` is false */
  error?: Error;
  refund?: RefundReceipt;
}
