import { hashTypedData, zeroAddress, type Address, type Hex } from 'viem';
import { EIP712_DOMAIN, ETH_TOKEN, RELAYED_OPERATION_TYPES } from '../constants';
import type { RefundParams } from '../types';

export interface RelayDomain {
  chainId: bigint;
  /** Address of the module verifying the signatures */
  module: Address;
}

export interface RelayedOperationMessage {
  wallet: Address;
  data: Hex;
  nonce: bigint;
  refund?: RefundParams;
}

/**
 * Refund fields as signed when no refund was requested
 */
export const NO_REFUND: RefundParams = {
  gasPrice: 0n,
  gasLimit: 0n,
  token: ETH_TOKEN,
  recipient: zeroAddress,
};

/**
 * Builds the typed data signers approve for a relayed operation
 */
export function relayedOperationTypedData(message: RelayedOperationMessage, domain: RelayDomain) {
  const refund = message.refund ?? NO_REFUND;
  return {
    domain: {
      name: EIP712_DOMAIN.name,
      version: EIP712_DOMAIN.version,
      chainId: domain.chainId,
      verifyingContract: domain.module,
    },
    types: RELAYED_OPERATION_TYPES,
    primaryType: 'RelayedOperation',
    message: {
      wallet: message.wallet,
      data: message.data,
      nonce: message.nonce,
      gasPrice: refund.gasPrice,
      gasLimit: refund.gasLimit,
      refundToken: refund.token,
      refundAddress: refund.recipient,
    },
  } as const;
}

/**
 * Computes the EIP-712 hash signed by the approvers of a relayed operation
 */
export function hashRelayedOperation(message: RelayedOperationMessage, domain: RelayDomain): Hex {
  return hashTypedData(relayedOperationTypedData(message, domain));
}
