import { getAddress, isAddressEqual, size, type Address, type Hex } from 'viem';
import { silentLogger, type Logger } from '../logger';
import { systemClock, type Clock } from '../clock';
import type { WalletAccount } from '../account/WalletAccount';
import { WalletModuleError } from '../errors';
import { requireNonZeroAddress } from '../security/ModuleContext';
import { DEFAULT_REGISTRY_ID, MAX_REGISTRY_ID } from '../constants';
import type { ValidationFilter } from './filters';
import type { CallContext } from '../types';

/**
 * A dapp entry of a registry; active once `validAfter` has passed
 */
export interface DappAuthorisation {
  validAfter: bigint;
  filter: ValidationFilter | null;
}

interface PendingFilterUpdate {
  filter: ValidationFilter | null;
  validAfter: bigint;
}

interface Registry {
  manager: Address;
  authorisations: Map<Address, DappAuthorisation>;
  pendingFilterUpdates: Map<Address, PendingFilterUpdate>;
}

export interface DappRegistryConfig {
  /** Global owner; creates registries and manages the default one */
  owner: Address;
  /** Used to check that toggles come from a module authorised on the wallet */
  account: WalletAccount;
  /** Delay before new dapps and filter updates take effect (default 0) */
  timelockPeriod?: bigint;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Registries of pre-approved contracts, shared by all wallets.
 *
 * Each wallet holds a 256-bit mask of enabled registry ids. Bit 0 is inverted:
 * the default registry is enabled while the bit is clear, so a wallet that never
 * toggled anything uses the default registry only. Any code reading or writing
 * the mask has to go through `isEnabledRegistry` to keep that convention.
 */
export class DappRegistry {
  readonly owner: Address;

  private readonly account: WalletAccount;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly registries = new Map<number, Registry>();
  private readonly enabledRegistryIds = new Map<Address, bigint>();
  private timelockPeriod: bigint;
  private pendingTimelock: { period: bigint; effectiveAfter: bigint } | null = null;

  constructor(config: DappRegistryConfig) {
    requireNonZeroAddress(config.owner, 'Registry owner');
    this.owner = config.owner;
    this.account = config.account;
    this.timelockPeriod = config.timelockPeriod ?? 0n;
    this.clock = config.clock ?? systemClock;
    this.logger = (config.logger ?? silentLogger).child({ component: 'DappRegistry' });
    this.registries.set(DEFAULT_REGISTRY_ID, this.emptyRegistry(config.owner));
  }

  // --- Wallet side ---

  getEnabledRegistryMask(wallet: Address): bigint {
    return this.enabledRegistryIds.get(getAddress(wallet)) ?? 0n;
  }

  isEnabledRegistry(wallet: Address, registryId: number): boolean {
    const bitSet = ((this.getEnabledRegistryMask(wallet) >> BigInt(registryId)) & 1n) === 1n;
    return bitSet !== (registryId === DEFAULT_REGISTRY_ID);
  }

  /**
   * Whether a call from `wallet` attributed to `spender` is pre-approved.
   * Registries are consulted from the default one upwards; the first enabled
   * registry where `spender` is active decides.
   */
  async isAuthorised(wallet: Address, spender: Address, data: Hex, to: Address = spender): Promise<boolean> {
    const mask = this.getEnabledRegistryMask(wallet);
    const now = this.clock.now();
    for (let id = DEFAULT_REGISTRY_ID; id <= MAX_REGISTRY_ID; id++) {
      if (id > DEFAULT_REGISTRY_ID && mask >> BigInt(id) === 0n) {
        break;
      }
      if (!this.isEnabledRegistry(wallet, id)) {
        continue;
      }
      const authorisation = this.registries.get(id)?.authorisations.get(getAddress(spender));
      if (!authorisation || authorisation.validAfter > now) {
        continue;
      }
      if (!authorisation.filter || size(data) === 0) {
        return true;
      }
      return authorisation.filter.isValid({ wallet, spender, to, data });
    }
    return false;
  }

  /**
   * Enables or disables a registry for a wallet. Only a module authorised on the wallet may call this.
   */
  async toggleRegistry(ctx: CallContext, wallet: Address, registryId: number, enabled: boolean): Promise<void> {
    this.requireRegistryId(registryId);
    if (!(await this.account.isAuthorisedModule(wallet, ctx.sender))) {
      throw new WalletModuleError('NOT_AUTHORISED_MODULE', 'Caller is not an authorised module of the wallet', {
        wallet,
        sender: ctx.sender,
      });
    }
    this.requireRegistry(registryId);
    if (this.isEnabledRegistry(wallet, registryId) === enabled) {
      throw new WalletModuleError('REGISTRY_ALREADY_TOGGLED', `Registry ${registryId} is already ${enabled ? 'enabled' : 'disabled'}`, {
        wallet,
        registryId,
      });
    }

    const mask = this.getEnabledRegistryMask(wallet) ^ (1n << BigInt(registryId));
    this.enabledRegistryIds.set(getAddress(wallet), mask);
    this.logger.info({ event: 'ToggledRegistry', wallet, registryId, enabled }, 'registry toggled');
  }

  // --- Registry administration ---

  async createRegistry(ctx: CallContext, registryId: number, manager: Address): Promise<void> {
    this.requireOwner(ctx);
    this.requireRegistryId(registryId);
    requireNonZeroAddress(manager, 'Registry manager');
    if (this.registries.has(registryId)) {
      throw new WalletModuleError('DUPLICATE_REGISTRY', `Registry ${registryId} already exists`, { registryId });
    }
    this.registries.set(registryId, this.emptyRegistry(manager));
    this.logger.info({ event: 'RegistryCreated', registryId, manager }, 'registry created');
  }

  async removeRegistry(ctx: CallContext, registryId: number): Promise<void> {
    this.requireOwner(ctx);
    this.requireCustomRegistryId(registryId);
    this.requireRegistry(registryId);
    this.registries.delete(registryId);
    this.logger.info({ event: 'RegistryRemoved', registryId }, 'registry removed');
  }

  async changeManager(ctx: CallContext, registryId: number, manager: Address): Promise<void> {
    this.requireCustomRegistryId(registryId);
    const registry = this.requireManager(ctx, registryId);
    requireNonZeroAddress(manager, 'Registry manager');
    registry.manager = manager;
    this.logger.info({ event: 'RegistryManagerChanged', registryId, manager }, 'registry manager changed');
  }

  async addAuthorisationToRegistry(
    ctx: CallContext,
    registryId: number,
    dapp: Address,
    filter: ValidationFilter | null = null,
  ): Promise<DappAuthorisation> {
    const registry = this.requireManager(ctx, registryId);
    requireNonZeroAddress(dapp, 'Dapp');
    const key = getAddress(dapp);
    if (registry.authorisations.has(key)) {
      throw new WalletModuleError('DUPLICATE_DAPP', 'Dapp is already in the registry', { registryId, dapp });
    }
    const authorisation: DappAuthorisation = { validAfter: this.clock.now() + this.timelockPeriod, filter };
    registry.authorisations.set(key, authorisation);
    this.logger.info(
      { event: 'DappAdded', registryId, dapp, validAfter: authorisation.validAfter, filtered: filter !== null },
      'dapp authorised',
    );
    return authorisation;
  }

  async removeAuthorisationFromRegistry(ctx: CallContext, registryId: number, dapp: Address): Promise<void> {
    const registry = this.requireManager(ctx, registryId);
    const key = getAddress(dapp);
    if (!registry.authorisations.delete(key)) {
      throw new WalletModuleError('UNKNOWN_DAPP', 'Dapp is not in the registry', { registryId, dapp });
    }
    registry.pendingFilterUpdates.delete(key);
    this.logger.info({ event: 'DappRemoved', registryId, dapp }, 'dapp removed');
  }

  async requestFilterUpdate(
    ctx: CallContext,
    registryId: number,
    dapp: Address,
    filter: ValidationFilter | null,
  ): Promise<bigint> {
    const registry = this.requireManager(ctx, registryId);
    const key = getAddress(dapp);
    if (!registry.authorisations.has(key)) {
      throw new WalletModuleError('UNKNOWN_DAPP', 'Dapp is not in the registry', { registryId, dapp });
    }
    const validAfter = this.clock.now() + this.timelockPeriod;
    registry.pendingFilterUpdates.set(key, { filter, validAfter });
    this.logger.info({ event: 'FilterUpdateRequested', registryId, dapp, validAfter }, 'filter update requested');
    return validAfter;
  }

  /**
   * Applies a requested filter update once the timelock has passed. Callable by anyone.
   */
  async confirmFilterUpdate(_ctx: CallContext, registryId: number, dapp: Address): Promise<void> {
    const registry = this.requireRegistry(registryId);
    const key = getAddress(dapp);
    const pending = registry.pendingFilterUpdates.get(key);
    if (!pending) {
      throw new WalletModuleError('NO_PENDING_FILTER_UPDATE', 'No pending filter update', { registryId, dapp });
    }
    if (pending.validAfter > this.clock.now()) {
      throw new WalletModuleError('FILTER_UPDATE_NOT_READY', 'Filter update is still timelocked', {
        validAfter: pending.validAfter,
      });
    }
    const authorisation = registry.authorisations.get(key);
    if (!authorisation) {
      throw new WalletModuleError('UNKNOWN_DAPP', 'Dapp is not in the registry', { registryId, dapp });
    }
    authorisation.filter = pending.filter;
    registry.pendingFilterUpdates.delete(key);
    this.logger.info({ event: 'FilterUpdated', registryId, dapp }, 'filter updated');
  }

  async requestTimelockChange(ctx: CallContext, period: bigint): Promise<bigint> {
    this.requireOwner(ctx);
    const effectiveAfter = this.clock.now() + this.timelockPeriod;
    this.pendingTimelock = { period, effectiveAfter };
    this.logger.info({ event: 'TimelockChangeRequested', period, effectiveAfter }, 'timelock change requested');
    return effectiveAfter;
  }

  async confirmTimelockChange(_ctx: CallContext): Promise<void> {
    if (!this.pendingTimelock) {
      throw new WalletModuleError('NO_PENDING_TIMELOCK_CHANGE', 'No pending timelock change');
    }
    if (this.pendingTimelock.effectiveAfter > this.clock.now()) {
      throw new WalletModuleError('TIMELOCK_CHANGE_NOT_READY', 'Timelock change is not yet effective', {
        effectiveAfter: this.pendingTimelock.effectiveAfter,
      });
    }
    this.timelockPeriod = this.pendingTimelock.period;
    this.pendingTimelock = null;
    this.logger.info({ event: 'TimelockChanged', period: this.timelockPeriod }, 'timelock changed');
  }

  // --- Queries ---

  getAuthorisation(registryId: number, dapp: Address): DappAuthorisation | null {
    return this.registries.get(registryId)?.authorisations.get(getAddress(dapp)) ?? null;
  }

  getRegistryManager(registryId: number): Address | null {
    return this.registries.get(registryId)?.manager ?? null;
  }

  getTimelockPeriod(): bigint {
    return this.timelockPeriod;
  }

  // --- Internals ---

  private emptyRegistry(manager: Address): Registry {
    return { manager, authorisations: new Map(), pendingFilterUpdates: new Map() };
  }

  private requireOwner(ctx: CallContext): void {
    if (!isAddressEqual(ctx.sender, this.owner)) {
      throw new WalletModuleError('NOT_REGISTRY_OWNER', 'Caller is not the registry owner', { sender: ctx.sender });
    }
  }

  private requireRegistryId(registryId: number): void {
    if (!Number.isInteger(registryId) || registryId < DEFAULT_REGISTRY_ID || registryId > MAX_REGISTRY_ID) {
      throw new WalletModuleError('INVALID_REGISTRY_ID', `Registry id must be between 0 and ${MAX_REGISTRY_ID}`, {
        registryId,
      });
    }
  }

  private requireCustomRegistryId(registryId: number): void {
    this.requireRegistryId(registryId);
    if (registryId === DEFAULT_REGISTRY_ID) {
      throw new WalletModuleError('INVALID_REGISTRY_ID', 'The default registry cannot be modified this way', {
        registryId,
      });
    }
  }

  private requireRegistry(registryId: number): Registry {
    const registry = this.registries.get(registryId);
    if (!registry) {
      throw new WalletModuleError('UNKNOWN_REGISTRY', `Registry ${registryId} does not exist`, { registryId });
    }
    return registry;
  }

  private requireManager(ctx: CallContext, registryId: number): Registry {
    const registry = this.requireRegistry(registryId);
    if (!isAddressEqual(ctx.sender, registry.manager)) {
      throw new WalletModuleError('NOT_REGISTRY_MANAGER', `Caller does not manage registry ${registryId}`, {
        registryId,
        sender: ctx.sender,
      });
    }
    return registry;
  }
}
