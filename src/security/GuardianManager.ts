import { encodePacked, isAddressEqual, keccak256, type Address, type Hex } from 'viem';
import type { Logger } from '../logger';
import type { GuardianProbe } from '../account/GuardianProbe';
import { WalletModuleError } from '../errors';
import { AccessGuard, requireNonZeroAddress, type ModuleContext } from './ModuleContext';
import type { CallContext, GuardianChangeDirection } from '../types';

/**
 * Identifier of a pending guardian change
 */
export function pendingChangeId(wallet: Address, guardian: Address, direction: GuardianChangeDirection): Hex {
  return keccak256(encodePacked(['address', 'address', 'string'], [wallet, guardian, direction]));
}

/**
 * Two-phase, time-locked guardian management.
 *
 * A request becomes confirmable strictly after `securityPeriod` and stays so
 * until `securityPeriod + securityWindow`. Confirmation is open to anyone so
 * that a third party can complete it; once the window is missed the change has
 * to be requested again.
 */
export class GuardianManager {
  private readonly guard: AccessGuard;
  private readonly logger: Logger;
  private readonly pending = new Map<Hex, bigint>();

  constructor(
    private readonly module: ModuleContext,
    private readonly probe: GuardianProbe,
  ) {
    this.guard = new AccessGuard(module);
    this.logger = module.logger.child({ component: 'GuardianManager' });
  }

  // --- Addition ---

  /**
   * Requests a new guardian. The first guardian of a wallet is added at once.
   * @returns the confirmation eligibility timestamp, or null if the guardian was added immediately
   */
  async requestAddGuardian(ctx: CallContext, wallet: Address, guardian: Address): Promise<bigint | null> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    requireNonZeroAddress(guardian, 'Guardian');
    await this.requireEligibleGuardian(wallet, guardian);
    if (!(await this.probe.isGuardianCapable(guardian))) {
      throw new WalletModuleError('GUARDIAN_PROBE_FAILED', 'Guardian must be an EOA or a contract exposing owner()', {
        guardian,
      });
    }

    if ((await this.module.guardianStore.guardianCount(wallet)) === 0) {
      await this.module.guardianStore.addGuardian(wallet, guardian);
      this.logger.info({ event: 'GuardianAdded', wallet, guardian }, 'first guardian added');
      return null;
    }

    const confirmAfter = this.openPendingChange(wallet, guardian, 'addition');
    this.logger.info({ event: 'GuardianAdditionRequested', wallet, guardian, confirmAfter }, 'guardian addition requested');
    return confirmAfter;
  }

  async confirmAddGuardian(_ctx: CallContext, wallet: Address, guardian: Address): Promise<void> {
    this.guard.requireUnlocked(wallet);
    const id = this.requireConfirmable(wallet, guardian, 'addition');
    // ownership, guardians and the session may have changed since the request
    await this.requireEligibleGuardian(wallet, guardian);

    await this.module.guardianStore.addGuardian(wallet, guardian);
    this.pending.delete(id);
    this.logger.info({ event: 'GuardianAdded', wallet, guardian }, 'guardian addition confirmed');
  }

  async cancelAddGuardian(ctx: CallContext, wallet: Address, guardian: Address): Promise<void> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    this.cancelPendingChange(wallet, guardian, 'addition');
    this.logger.info({ event: 'GuardianAdditionCancelled', wallet, guardian }, 'guardian addition cancelled');
  }

  // --- Revocation ---

  /**
   * @returns the confirmation eligibility timestamp
   */
  async requestRevokeGuardian(ctx: CallContext, wallet: Address, guardian: Address): Promise<bigint> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    if (!(await this.module.guardianStore.isGuardian(wallet, guardian))) {
      throw new WalletModuleError('NOT_A_GUARDIAN', 'Address is not a guardian', { wallet, guardian });
    }

    const confirmAfter = this.openPendingChange(wallet, guardian, 'revocation');
    this.logger.info(
      { event: 'GuardianRevocationRequested', wallet, guardian, confirmAfter },
      'guardian revocation requested',
    );
    return confirmAfter;
  }

  async confirmRevokeGuardian(_ctx: CallContext, wallet: Address, guardian: Address): Promise<void> {
    this.guard.requireUnlocked(wallet);
    const id = this.requireConfirmable(wallet, guardian, 'revocation');

    await this.module.guardianStore.revokeGuardian(wallet, guardian);
    this.pending.delete(id);
    this.logger.info({ event: 'GuardianRevoked', wallet, guardian }, 'guardian revocation confirmed');
  }

  async cancelRevokeGuardian(ctx: CallContext, wallet: Address, guardian: Address): Promise<void> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    this.cancelPendingChange(wallet, guardian, 'revocation');
    this.logger.info({ event: 'GuardianRevocationCancelled', wallet, guardian }, 'guardian revocation cancelled');
  }

  // --- Queries ---

  async guardianCount(wallet: Address): Promise<number> {
    return this.module.guardianStore.guardianCount(wallet);
  }

  async getGuardians(wallet: Address): Promise<Address[]> {
    return this.module.guardianStore.getGuardians(wallet);
  }

  async isGuardian(wallet: Address, address: Address): Promise<boolean> {
    return this.module.guardianStore.isGuardian(wallet, address);
  }

  /** Eligibility timestamp of a pending addition, or null */
  getPendingAddition(wallet: Address, guardian: Address): bigint | null {
    return this.pending.get(pendingChangeId(wallet, guardian, 'addition')) ?? null;
  }

  /** Eligibility timestamp of a pending revocation, or null */
  getPendingRevocation(wallet: Address, guardian: Address): bigint | null {
    return this.pending.get(pendingChangeId(wallet, guardian, 'revocation')) ?? null;
  }

  // --- Internals ---

  private async requireEligibleGuardian(wallet: Address, guardian: Address): Promise<void> {
    if (await this.guard.isOwner(wallet, guardian)) {
      throw new WalletModuleError('GUARDIAN_IS_OWNER', 'Guardian cannot be the wallet owner', { wallet, guardian });
    }
    const session = this.module.sessions.getActive(wallet, this.module.clock.now());
    if (session && isAddressEqual(session.key, guardian)) {
      throw new WalletModuleError('GUARDIAN_IS_SESSION_KEY', 'Guardian cannot be the session key', {
        wallet,
        guardian,
      });
    }
    if (await this.module.guardianStore.isGuardian(wallet, guardian)) {
      throw new WalletModuleError('DUPLICATE_GUARDIAN', 'Address is already a guardian', { wallet, guardian });
    }
  }

  private openPendingChange(wallet: Address, guardian: Address, direction: GuardianChangeDirection): bigint {
    const { securityPeriod, securityWindow } = this.module.security;
    const now = this.module.clock.now();
    const id = pendingChangeId(wallet, guardian, direction);
    const existing = this.pending.get(id);
    if (existing !== undefined && now <= existing + securityWindow) {
      throw new WalletModuleError('DUPLICATE_PENDING_CHANGE', `A guardian ${direction} is already pending`, {
        wallet,
        guardian,
        confirmAfter: existing,
      });
    }
    const confirmAfter = now + securityPeriod;
    this.pending.set(id, confirmAfter);
    return confirmAfter;
  }

  private requireConfirmable(wallet: Address, guardian: Address, direction: GuardianChangeDirection): Hex {
    const id = pendingChangeId(wallet, guardian, direction);
    const confirmAfter = this.pending.get(id);
    if (confirmAfter === undefined) {
      throw new WalletModuleError('UNKNOWN_PENDING_CHANGE', `No pending guardian ${direction}`, { wallet, guardian });
    }
    const now = this.module.clock.now();
    if (now <= confirmAfter) {
      throw new WalletModuleError('PENDING_CHANGE_NOT_OVER', `Guardian ${direction} is not yet confirmable`, {
        confirmAfter,
        now,
      });
    }
    if (now >= confirmAfter + this.module.security.securityWindow) {
      throw new WalletModuleError('PENDING_CHANGE_EXPIRED', `Guardian ${direction} confirmation window has expired`, {
        expiredAt: confirmAfter + this.module.security.securityWindow,
        now,
      });
    }
    return id;
  }

  private cancelPendingChange(wallet: Address, guardian: Address, direction: GuardianChangeDirection): void {
    const id = pendingChangeId(wallet, guardian, direction);
    if (!this.pending.has(id)) {
      throw new WalletModuleError('UNKNOWN_PENDING_CHANGE', `No pending guardian ${direction}`, { wallet, guardian });
    }
    this.pending.delete(id);
  }
}
