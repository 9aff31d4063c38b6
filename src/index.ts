export { WalletModule, DEFAULT_SECURITY_PARAMETERS } from './WalletModule';
export type { WalletModuleConfig, WalletModuleDependencies } from './WalletModule';

export { GuardianManager, pendingChangeId } from './security/GuardianManager';
export { RecoveryManager, type RecoveryState } from './security/RecoveryManager';
export { LockManager } from './security/LockManager';
export { AccessGuard, requireNonZeroAddress, type ModuleContext } from './security/ModuleContext';

export { DappRegistry } from './dapp/DappRegistry';
export type { DappAuthorisation, DappRegistryConfig } from './dapp/DappRegistry';
export { SelectorFilter, type FilterInput, type ValidationFilter } from './dapp/filters';

export { TransactionManager } from './transactions/TransactionManager';
export type { TransactionManagerConfig, SessionApproval, SessionBatchOptions } from './transactions/TransactionManager';
export { recoverSpender, SPENDER_METHODS_ABI } from './transactions/spender';

export { RelayExecutor, type RelayExecutorConfig } from './relay/RelayExecutor';
export { WalletModuleAbi } from './relay/abi';
export { encodeOperation, decodeOperation } from './relay/operations';
export { getSignatureRequirement, majorityOfGuardians, type QuorumInputs } from './relay/signaturePolicy';
export { hashRelayedOperation, relayedOperationTypedData, NO_REFUND } from './relay/eip712';
export type { RelayDomain, RelayedOperationMessage } from './relay/eip712';

export type { WalletAccount } from './account/WalletAccount';
export { PublicClientGuardianProbe, OWNABLE_ABI } from './account/GuardianProbe';
export type { GuardianProbe, PublicClientGuardianProbeConfig } from './account/GuardianProbe';

export * from './stores';
export { systemClock, type Clock } from './clock';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger';
export { loadConfig, parseSecurityParameters, SecurityParametersSchema, type ModuleConfig } from './config';
export { WalletModuleError, isWalletModuleError, ERROR_CODES, type ErrorCode, type ErrorKind } from './errors';
export * from './constants';
export * from './types';
