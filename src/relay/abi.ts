const wallet = { name: 'wallet', type: 'address', internalType: 'address' } as const;
const guardian = { name: 'guardian', type: 'address', internalType: 'address' } as const;

const calls = {
  name: 'calls',
  type: 'tuple[]',
  internalType: 'struct BatchedCall[]',
  components: [
    { name: 'to', type: 'address', internalType: 'address' },
    { name: 'value', type: 'uint256', internalType: 'uint256' },
    { name: 'data', type: 'bytes', internalType: 'bytes' },
    { name: 'isSpenderInData', type: 'bool', internalType: 'bool' },
  ],
} as const;

const session = {
  name: 'session',
  type: 'tuple',
  internalType: 'struct Session',
  components: [
    { name: 'key', type: 'address', internalType: 'address' },
    { name: 'expires', type: 'uint64', internalType: 'uint64' },
  ],
} as const;

/**
 * Wire format of relayed operations: one function per operation kind
 */
export const WalletModuleAbi = [
  {
    type: 'function',
    name: 'multiCall',
    inputs: [wallet, calls],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'multiCallWithSession',
    inputs: [wallet, session, calls],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'multiCallWithGuardians',
    inputs: [wallet, calls],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'multiCallWithGuardiansAndStartSession',
    inputs: [
      wallet,
      calls,
      { name: 'sessionUser', type: 'address', internalType: 'address' },
      { name: 'duration', type: 'uint64', internalType: 'uint64' },
    ],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'addToWhitelist',
    inputs: [wallet, { name: 'target', type: 'address', internalType: 'address' }],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'removeFromWhitelist',
    inputs: [wallet, { name: 'target', type: 'address', internalType: 'address' }],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'addModule',
    inputs: [wallet, { name: 'module', type: 'address', internalType: 'address' }],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'clearSession',
    inputs: [wallet],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'addGuardian',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'revokeGuardian',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'cancelGuardianAddition',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'cancelGuardianRevocation',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'confirmGuardianAddition',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'confirmGuardianRevocation',
    inputs: [wallet, guardian],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'executeRecovery',
    inputs: [wallet, { name: 'recovery', type: 'address', internalType: 'address' }],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'finalizeRecovery',
    inputs: [wallet],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'cancelRecovery',
    inputs: [wallet],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'transferOwnership',
    inputs: [wallet, { name: 'newOwner', type: 'address', internalType: 'address' }],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'toggleDappRegistry',
    inputs: [
      wallet,
      { name: 'registryId', type: 'uint8', internalType: 'uint8' },
      { name: 'enabled', type: 'bool', internalType: 'bool' },
    ],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'lock',
    inputs: [wallet],
    outputs: [],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'unlock',
    inputs: [wallet],
    outputs: [],
    stateMutability: 'nonpayable',
  },
] as const;
