import type { Address } from 'viem';

/**
 * EIP-712 domain parameters for relayed operations
 */
export const EIP712_DOMAIN = {
  name: 'WalletSecurityModule',
  version: '1',
} as const;

/**
 * RelayedOperation EIP-712 type definition
 * Used with viem's hashTypedData
 */
export const RELAYED_OPERATION_TYPES = {
  RelayedOperation: [
    { name: 'wallet', type: 'address' },
    { name: 'data', type: 'bytes' },
    { name: 'nonce', type: 'uint256' },
    { name: 'gasPrice', type: 'uint256' },
    { name: 'gasLimit', type: 'uint256' },
    { name: 'refundToken', type: 'address' },
    { name: 'refundAddress', type: 'address' },
  ],
} as const;

/**
 * Pseudo-address designating ether as the refund token
 */
export const ETH_TOKEN: Address = '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE';

/** Default delay before guardian changes and whitelist entries take effect (1 day) */
export const DEFAULT_SECURITY_PERIOD = 86400n;

/** Default recovery delay (2 days) */
export const DEFAULT_RECOVERY_PERIOD = 172800n;

/** Default confirmation window, recoveryPeriod - securityPeriod */
export const DEFAULT_SECURITY_WINDOW = DEFAULT_RECOVERY_PERIOD - DEFAULT_SECURITY_PERIOD;

/** Default lock duration (5 days) */
export const DEFAULT_LOCK_PERIOD = 432000n;

/**
 * Default registry id. Its bit in a wallet's mask is inverted: clear means enabled.
 */
export const DEFAULT_REGISTRY_ID = 0;

export const MAX_REGISTRY_ID = 255;

/**
 * Gas stipend for the `owner()` probe made on prospective guardians
 */
export const GUARDIAN_PROBE_GAS = 25000n;

/** Fixed gas added to the measured usage of an ETH refund */
export const ETH_REFUND_GAS_OVERHEAD = 23000n;

/** Fixed gas added to the measured usage of an ERC-20 refund */
export const TOKEN_REFUND_GAS_OVERHEAD = 37500n;
