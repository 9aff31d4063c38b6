import type { Address } from 'viem';
import type { Logger } from '../logger';
import { WalletModuleError } from '../errors';
import { AccessGuard, type ModuleContext } from './ModuleContext';
import type { CallContext, Lock } from '../types';

/**
 * Guardian-triggered wallet freeze.
 *
 * A manual lock can be lifted by any guardian. A lock imposed by a recovery can
 * only end by expiring or by the recovery being finalized or cancelled.
 */
export class LockManager {
  private readonly guard: AccessGuard;
  private readonly logger: Logger;

  constructor(private readonly module: ModuleContext) {
    this.guard = new AccessGuard(module);
    this.logger = module.logger.child({ component: 'LockManager' });
  }

  async lock(ctx: CallContext, wallet: Address): Promise<bigint> {
    await this.guard.requireGuardianOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);

    const releaseAfter = this.module.clock.now() + this.module.security.lockPeriod;
    this.module.locks.set(wallet, releaseAfter, 'manual');
    this.logger.info({ event: 'Locked', wallet, releaseAfter }, 'wallet locked');
    return releaseAfter;
  }

  async unlock(ctx: CallContext, wallet: Address): Promise<void> {
    await this.guard.requireGuardianOrSelf(ctx, wallet);
    this.guard.requireLocked(wallet);

    const { locker } = this.module.locks.get(wallet);
    if (locker !== 'manual') {
      throw new WalletModuleError('LOCK_NOT_MANUAL', 'Lock was not imposed manually and cannot be lifted', {
        wallet,
        locker,
      });
    }
    this.module.locks.clear(wallet);
    this.logger.info({ event: 'Unlocked', wallet }, 'wallet unlocked');
  }

  isLocked(wallet: Address): boolean {
    return this.module.locks.isLocked(wallet, this.module.clock.now());
  }

  /**
   * Current lock; an expired lock reads as unlocked
   */
  getLock(wallet: Address): Lock {
    if (!this.isLocked(wallet)) {
      return { releaseAfter: 0n, locker: null };
    }
    return this.module.locks.get(wallet);
  }
}
