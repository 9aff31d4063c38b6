import type { Address, Hex } from 'viem';
import { createLogger, silentLogger, type Logger } from './logger';
import { systemClock, type Clock } from './clock';
import { parseSecurityParameters, type ModuleConfig } from './config';
import {
  DEFAULT_LOCK_PERIOD,
  DEFAULT_RECOVERY_PERIOD,
  DEFAULT_SECURITY_PERIOD,
  DEFAULT_SECURITY_WINDOW,
} from './constants';
import type { WalletAccount } from './account/WalletAccount';
import type { GuardianProbe } from './account/GuardianProbe';
import { MemoryGuardianStore, type GuardianStore } from './stores/GuardianStore';
import { MemoryWhitelistStore, type WhitelistStore } from './stores/WhitelistStore';
import { MemoryModuleRegistry, type ModuleRegistry } from './stores/ModuleRegistry';
import { LockStore } from './stores/LockStore';
import { SessionStore } from './stores/SessionStore';
import { requireNonZeroAddress, type ModuleContext } from './security/ModuleContext';
import { GuardianManager } from './security/GuardianManager';
import { RecoveryManager } from './security/RecoveryManager';
import { LockManager } from './security/LockManager';
import { DappRegistry } from './dapp/DappRegistry';
import { TransactionManager } from './transactions/TransactionManager';
import { RelayExecutor } from './relay/RelayExecutor';
import type { CallContext, RelayRequest, RelayResult, SecurityParameters, SignatureRequirement } from './types';

export interface WalletModuleConfig {
  /** Address the module acts under; relayed calls reach components as this sender */
  address: Address;
  chainId: bigint;
  account: WalletAccount;
  probe: GuardianProbe;
  /** Registry shared with other modules */
  dappRegistry: DappRegistry;
  guardianStore?: GuardianStore;
  whitelistStore?: WhitelistStore;
  moduleRegistry?: ModuleRegistry;
  /** Validated on construction; defaults to the production timings */
  security?: SecurityParameters;
  clock?: Clock;
  logger?: Logger;
}

export type WalletModuleDependencies = Omit<WalletModuleConfig, 'chainId' | 'security' | 'logger' | 'dappRegistry'> & {
  /** Owner of the dapp registry created for the module */
  registryOwner: Address;
};

export const DEFAULT_SECURITY_PARAMETERS: SecurityParameters = {
  securityPeriod: DEFAULT_SECURITY_PERIOD,
  securityWindow: DEFAULT_SECURITY_WINDOW,
  lockPeriod: DEFAULT_LOCK_PERIOD,
  recoveryPeriod: DEFAULT_RECOVERY_PERIOD,
};

/**
 * Security module of a wallet: guardians, recovery, locks, outgoing calls and
 * the relay, sharing one set of stores.
 *
 * Components are exposed so their operations can be called directly by the
 * owner or a guardian; `relay` runs the same operations from off-chain signatures.
 */
export class WalletModule {
  readonly address: Address;
  readonly guardians: GuardianManager;
  readonly recovery: RecoveryManager;
  readonly locks: LockManager;
  readonly transactions: TransactionManager;
  readonly dappRegistry: DappRegistry;
  readonly relayer: RelayExecutor;

  constructor(config: WalletModuleConfig) {
    requireNonZeroAddress(config.address, 'Module address');
    const logger = (config.logger ?? silentLogger).child({ module: config.address });
    const context: ModuleContext = {
      address: config.address,
      account: config.account,
      guardianStore: config.guardianStore ?? new MemoryGuardianStore(),
      locks: new LockStore(),
      sessions: new SessionStore(),
      clock: config.clock ?? systemClock,
      security: parseSecurityParameters(config.security ?? DEFAULT_SECURITY_PARAMETERS),
      logger,
    };

    this.address = config.address;
    this.dappRegistry = config.dappRegistry;
    this.guardians = new GuardianManager(context, config.probe);
    this.recovery = new RecoveryManager(context);
    this.locks = new LockManager(context);
    this.transactions = new TransactionManager(context, {
      whitelistStore: config.whitelistStore ?? new MemoryWhitelistStore(),
      moduleRegistry: config.moduleRegistry ?? new MemoryModuleRegistry(),
      dappRegistry: config.dappRegistry,
    });
    this.relayer = new RelayExecutor(context, {
      chainId: config.chainId,
      probe: config.probe,
      guardians: this.guardians,
      recovery: this.recovery,
      locks: this.locks,
      dappRegistry: config.dappRegistry,
      transactions: this.transactions,
    });

    logger.info({ chainId: config.chainId, security: context.security }, 'wallet module ready');
  }

  /**
   * Builds a module and its own dapp registry from loaded configuration
   */
  static fromConfig(config: ModuleConfig, dependencies: WalletModuleDependencies): WalletModule {
    const { registryOwner, ...rest } = dependencies;
    const logger = createLogger({ level: config.logLevel });
    const dappRegistry = new DappRegistry({
      owner: registryOwner,
      account: rest.account,
      timelockPeriod: config.dappRegistryTimelock,
      clock: rest.clock,
      logger,
    });
    return new WalletModule({
      ...rest,
      chainId: config.chainId,
      security: config.security,
      dappRegistry,
      logger,
    });
  }

  relay(ctx: CallContext, request: RelayRequest): Promise<RelayResult> {
    return this.relayer.relay(ctx, request);
  }

  getNonce(wallet: Address): bigint {
    return this.relayer.getNonce(wallet);
  }

  getRequiredSignatures(wallet: Address, data: Hex): Promise<SignatureRequirement> {
    return this.relayer.getRequiredSignatures(wallet, data);
  }
}
