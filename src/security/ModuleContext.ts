import { isAddressEqual, zeroAddress, type Address } from 'viem';
import type { Logger } from '../logger';
import type { Clock } from '../clock';
import type { WalletAccount } from '../account/WalletAccount';
import type { GuardianStore } from '../stores/GuardianStore';
import type { LockStore } from '../stores/LockStore';
import type { SessionStore } from '../stores/SessionStore';
import { WalletModuleError } from '../errors';
import type { CallContext, SecurityParameters } from '../types';

/**
 * State and collaborators shared by the security components of one module
 */
export interface ModuleContext {
  /** The module's own address; calls from it are relayed calls */
  address: Address;
  account: WalletAccount;
  guardianStore: GuardianStore;
  locks: LockStore;
  sessions: SessionStore;
  clock: Clock;
  security: SecurityParameters;
  logger: Logger;
}

/**
 * Caller and wallet-state checks common to every component
 */
export class AccessGuard {
  constructor(private readonly module: ModuleContext) {}

  isSelf(ctx: CallContext): boolean {
    return isAddressEqual(ctx.sender, this.module.address);
  }

  async isOwner(wallet: Address, address: Address): Promise<boolean> {
    return isAddressEqual(await this.module.account.owner(wallet), address);
  }

  requireSelf(ctx: CallContext): void {
    if (!this.isSelf(ctx)) {
      throw new WalletModuleError('NOT_SELF', 'Operation must be relayed through the module');
    }
  }

  async requireOwnerOrSelf(ctx: CallContext, wallet: Address): Promise<void> {
    if (this.isSelf(ctx) || (await this.isOwner(wallet, ctx.sender))) {
      return;
    }
    throw new WalletModuleError('NOT_OWNER_OR_SELF', 'Caller must be the wallet owner or the module', {
      wallet,
      sender: ctx.sender,
    });
  }

  async requireGuardianOrSelf(ctx: CallContext, wallet: Address): Promise<void> {
    if (this.isSelf(ctx) || (await this.module.guardianStore.isGuardian(wallet, ctx.sender))) {
      return;
    }
    throw new WalletModuleError('NOT_GUARDIAN_OR_SELF', 'Caller must be a guardian or the module', {
      wallet,
      sender: ctx.sender,
    });
  }

  requireUnlocked(wallet: Address): void {
    if (this.module.locks.isLocked(wallet, this.module.clock.now())) {
      throw new WalletModuleError('WALLET_LOCKED', 'Wallet is locked', { wallet });
    }
  }

  requireLocked(wallet: Address): void {
    if (!this.module.locks.isLocked(wallet, this.module.clock.now())) {
      throw new WalletModuleError('WALLET_UNLOCKED', 'Wallet must be locked', { wallet });
    }
  }
}

export function requireNonZeroAddress(address: Address, label: string): void {
  if (isAddressEqual(address, zeroAddress)) {
    throw new WalletModuleError('NULL_ADDRESS', `${label} cannot be the zero address`);
  }
}
