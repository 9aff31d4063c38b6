import { getAddress, type Address } from 'viem';
import type { Logger } from '../logger';
import { WalletModuleError } from '../errors';
import { AccessGuard, requireNonZeroAddress, type ModuleContext } from './ModuleContext';
import type { CallContext, RecoveryConfig } from '../types';

export type RecoveryState = 'NoRecovery' | 'PendingRecovery';

/**
 * Guardian-driven ownership recovery and ownership transfer.
 *
 * Starting and cancelling a recovery are only reachable through the relay,
 * which is where the guardian quorum is enforced. While a recovery is pending
 * the wallet is locked, which blocks every owner operation.
 */
export class RecoveryManager {
  private readonly guard: AccessGuard;
  private readonly logger: Logger;
  private readonly recoveries = new Map<Address, RecoveryConfig>();

  constructor(private readonly module: ModuleContext) {
    this.guard = new AccessGuard(module);
    this.logger = module.logger.child({ component: 'RecoveryManager' });
  }

  /**
   * Starts a recovery towards `recovery` and locks the wallet.
   * @returns the recorded recovery
   */
  async executeRecovery(ctx: CallContext, wallet: Address, recovery: Address): Promise<RecoveryConfig> {
    this.guard.requireSelf(ctx);
    if (this.getRecovery(wallet)) {
      throw new WalletModuleError('RECOVERY_IN_PROGRESS', 'A recovery is already in progress', { wallet });
    }
    await this.validateNewOwner(wallet, recovery);

    const now = this.module.clock.now();
    const config: RecoveryConfig = {
      recovery,
      executeAfter: now + this.module.security.recoveryPeriod,
      guardianCount: await this.module.guardianStore.guardianCount(wallet),
    };
    this.recoveries.set(getAddress(wallet), config);
    this.module.locks.set(wallet, now + this.module.security.lockPeriod, 'recovery');

    this.logger.info(
      { event: 'RecoveryExecuted', wallet, recovery, executeAfter: config.executeAfter },
      'recovery started',
    );
    return config;
  }

  /**
   * Completes a recovery once its delay has passed. Callable by anyone.
   */
  async finalizeRecovery(_ctx: CallContext, wallet: Address): Promise<Address> {
    const config = this.requireRecovery(wallet);
    const now = this.module.clock.now();
    if (now <= config.executeAfter) {
      throw new WalletModuleError('RECOVERY_PERIOD_NOT_OVER', 'Recovery period has not elapsed', {
        executeAfter: config.executeAfter,
        now,
      });
    }

    await this.module.account.setOwner(wallet, config.recovery);
    this.recoveries.delete(getAddress(wallet));
    this.module.sessions.clear(wallet);
    this.module.locks.clear(wallet);

    this.logger.info({ event: 'RecoveryFinalized', wallet, recovery: config.recovery }, 'recovery finalized');
    return config.recovery;
  }

  async cancelRecovery(ctx: CallContext, wallet: Address): Promise<void> {
    this.guard.requireSelf(ctx);
    const config = this.requireRecovery(wallet);

    this.recoveries.delete(getAddress(wallet));
    this.module.locks.clear(wallet);
    this.logger.info({ event: 'RecoveryCancelled', wallet, recovery: config.recovery }, 'recovery cancelled');
  }

  async transferOwnership(ctx: CallContext, wallet: Address, newOwner: Address): Promise<void> {
    this.guard.requireSelf(ctx);
    this.guard.requireUnlocked(wallet);
    await this.validateNewOwner(wallet, newOwner);

    await this.module.account.setOwner(wallet, newOwner);
    this.module.sessions.clear(wallet);
    this.logger.info({ event: 'OwnershipTransferred', wallet, newOwner }, 'ownership transferred');
  }

  getRecovery(wallet: Address): RecoveryConfig | null {
    return this.recoveries.get(getAddress(wallet)) ?? null;
  }

  getState(wallet: Address): RecoveryState {
    return this.getRecovery(wallet) ? 'PendingRecovery' : 'NoRecovery';
  }

  private requireRecovery(wallet: Address): RecoveryConfig {
    const config = this.getRecovery(wallet);
    if (!config) {
      throw new WalletModuleError('NO_RECOVERY_IN_PROGRESS', 'No recovery in progress', { wallet });
    }
    return config;
  }

  private async validateNewOwner(wallet: Address, newOwner: Address): Promise<void> {
    requireNonZeroAddress(newOwner, 'New owner');
    if (await this.module.guardianStore.isGuardian(wallet, newOwner)) {
      throw new WalletModuleError('NEW_OWNER_IS_GUARDIAN', 'New owner cannot be a guardian', { wallet, newOwner });
    }
  }
}
