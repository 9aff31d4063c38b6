import { isAddressEqual, type Address, type Hex } from 'viem';
import type { Logger } from '../logger';
import type { WhitelistStore } from '../stores/WhitelistStore';
import type { ModuleRegistry } from '../stores/ModuleRegistry';
import type { DappRegistry } from '../dapp/DappRegistry';
import { WalletModuleError } from '../errors';
import { AccessGuard, requireNonZeroAddress, type ModuleContext } from '../security/ModuleContext';
import { recoverSpender } from './spender';
import type { BatchedCall, Call, CallContext, Session } from '../types';

export interface TransactionManagerConfig {
  whitelistStore: WhitelistStore;
  moduleRegistry: ModuleRegistry;
  dappRegistry: DappRegistry;
}

/**
 * Who approved a session batch: the standing session key alone, or the owner
 * together with a majority of guardians
 */
export type SessionApproval = 'sessionKey' | 'guardians';

export interface SessionBatchOptions {
  approval: SessionApproval;
}

/**
 * Outgoing calls of a wallet: the whitelist, batched calls and session keys
 */
export class TransactionManager {
  private readonly guard: AccessGuard;
  private readonly logger: Logger;
  private readonly whitelistStore: WhitelistStore;
  private readonly moduleRegistry: ModuleRegistry;
  private readonly dappRegistry: DappRegistry;

  constructor(
    private readonly module: ModuleContext,
    config: TransactionManagerConfig,
  ) {
    this.guard = new AccessGuard(module);
    this.logger = module.logger.child({ component: 'TransactionManager' });
    this.whitelistStore = config.whitelistStore;
    this.moduleRegistry = config.moduleRegistry;
    this.dappRegistry = config.dappRegistry;
  }

  // --- Whitelist ---

  /**
   * Whitelists a target. The entry only becomes active after the security period,
   * so a stolen owner key cannot whitelist a destination and drain to it at once.
   * @returns the timestamp after which the target is whitelisted
   */
  async addToWhitelist(ctx: CallContext, wallet: Address, target: Address): Promise<bigint> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    requireNonZeroAddress(target, 'Whitelist target');
    if (isAddressEqual(target, wallet)) {
      throw new WalletModuleError('CANNOT_WHITELIST_WALLET', 'A wallet cannot whitelist itself', { wallet });
    }
    if (await this.moduleRegistry.isRegisteredModule(target)) {
      throw new WalletModuleError('CANNOT_WHITELIST_MODULE', 'Modules cannot be whitelisted', { target });
    }
    if ((await this.whitelistStore.getWhitelist(wallet, target)) !== 0n) {
      throw new WalletModuleError('ALREADY_WHITELISTED', 'Target is already whitelisted', { wallet, target });
    }

    const whitelistAfter = this.module.clock.now() + this.module.security.securityPeriod;
    await this.whitelistStore.setWhitelist(wallet, target, whitelistAfter);
    this.logger.info({ event: 'AddedToWhitelist', wallet, target, whitelistAfter }, 'whitelist entry added');
    return whitelistAfter;
  }

  async removeFromWhitelist(ctx: CallContext, wallet: Address, target: Address): Promise<void> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    await this.whitelistStore.setWhitelist(wallet, target, 0n);
    this.logger.info({ event: 'RemovedFromWhitelist', wallet, target }, 'whitelist entry removed');
  }

  async isWhitelisted(wallet: Address, target: Address): Promise<boolean> {
    const whitelistAfter = await this.whitelistStore.getWhitelist(wallet, target);
    return whitelistAfter > 0n && whitelistAfter < this.module.clock.now();
  }

  // --- Batched calls ---

  /**
   * Owner-approved batch. Every call must go to a whitelisted or dapp-authorised spender.
   */
  async multiCall(ctx: CallContext, wallet: Address, calls: BatchedCall[]): Promise<Hex[]> {
    this.guard.requireSelf(ctx);
    this.guard.requireUnlocked(wallet);
    await this.requireAuthorisedCalls(wallet, calls);
    return this.execute(wallet, calls);
  }

  /**
   * Batch approved by a session. Neither approval runs the per-call check.
   * Only the owner and guardians can open a standing session, and only when
   * none is active; a zero expiry leaves the session to this batch alone.
   */
  async multiCallWithSession(
    ctx: CallContext,
    wallet: Address,
    session: Session,
    calls: BatchedCall[],
    options: SessionBatchOptions,
  ): Promise<Hex[]> {
    this.guard.requireSelf(ctx);
    this.guard.requireUnlocked(wallet);

    if (options.approval === 'sessionKey') {
      return this.execute(wallet, calls);
    }

    const now = this.module.clock.now();
    const opensSession = session.expires !== 0n && this.module.sessions.getActive(wallet, now) === null;
    if (opensSession) {
      if (session.expires <= now) {
        throw new WalletModuleError('INVALID_SESSION_DURATION', 'Session expiry must be in the future', {
          expires: session.expires,
        });
      }
      await this.requireValidSessionKey(wallet, session.key);
    } else if (session.expires !== 0n) {
      this.logger.warn({ wallet, key: session.key }, 'session already active, requested session not stored');
    }

    const results = await this.execute(wallet, calls);
    if (opensSession) {
      this.module.sessions.set(wallet, session);
      this.logger.info({ event: 'SessionCreated', wallet, key: session.key, expires: session.expires }, 'session created');
    }
    return results;
  }

  /**
   * Batch approved by the owner and a majority of guardians; no per-call check
   */
  async multiCallWithGuardians(ctx: CallContext, wallet: Address, calls: BatchedCall[]): Promise<Hex[]> {
    this.guard.requireSelf(ctx);
    this.guard.requireUnlocked(wallet);
    return this.execute(wallet, calls);
  }

  async multiCallWithGuardiansAndStartSession(
    ctx: CallContext,
    wallet: Address,
    calls: BatchedCall[],
    sessionUser: Address,
    duration: bigint,
  ): Promise<Hex[]> {
    this.guard.requireSelf(ctx);
    this.guard.requireUnlocked(wallet);
    await this.requireValidSessionKey(wallet, sessionUser);
    if (duration <= 0n) {
      throw new WalletModuleError('INVALID_SESSION_DURATION', 'Session duration must be positive', { duration });
    }

    const results = await this.execute(wallet, calls);
    const expires = this.module.clock.now() + duration;
    this.module.sessions.set(wallet, { key: sessionUser, expires });
    this.logger.info({ event: 'SessionCreated', wallet, key: sessionUser, expires }, 'session created');
    return results;
  }

  // --- Sessions ---

  async clearSession(ctx: CallContext, wallet: Address): Promise<void> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    this.module.sessions.clear(wallet);
    this.logger.info({ event: 'SessionCleared', wallet }, 'session cleared');
  }

  /**
   * The standing session, if it has not expired
   */
  getSession(wallet: Address): Session | null {
    return this.module.sessions.getActive(wallet, this.module.clock.now());
  }

  // --- Modules ---

  async addModule(ctx: CallContext, wallet: Address, module: Address): Promise<void> {
    await this.guard.requireOwnerOrSelf(ctx, wallet);
    this.guard.requireUnlocked(wallet);
    if (!(await this.moduleRegistry.isRegisteredModule(module))) {
      throw new WalletModuleError('UNREGISTERED_MODULE', 'Module is not registered', { module });
    }
    await this.module.account.authoriseModule(wallet, module, true);
    this.logger.info({ event: 'ModuleAdded', wallet, module }, 'module authorised');
  }

  // --- Authorisation ---

  /**
   * Whether a single call may be made by an owner-approved batch
   */
  async isAuthorisedCall(wallet: Address, call: BatchedCall): Promise<boolean> {
    const spender = this.spenderOf(call);
    if (call.value !== 0n && !isAddressEqual(spender, call.to)) {
      return false;
    }
    return (
      (await this.isWhitelisted(wallet, spender)) ||
      (await this.dappRegistry.isAuthorised(wallet, spender, call.data, call.to))
    );
  }

  private spenderOf(call: BatchedCall): Address {
    return call.isSpenderInData ? recoverSpender(call.to, call.data) : call.to;
  }

  private async requireAuthorisedCalls(wallet: Address, calls: BatchedCall[]): Promise<void> {
    for (const [index, call] of calls.entries()) {
      if (call.value !== 0n && !isAddressEqual(this.spenderOf(call), call.to)) {
        throw new WalletModuleError('VALUE_TO_SPENDER', `Call ${index} sends value to a contract it does not target`, {
          wallet,
          index,
          to: call.to,
        });
      }
      if (!(await this.isAuthorisedCall(wallet, call))) {
        throw new WalletModuleError('CALL_NOT_AUTHORISED', `Call ${index} is not authorised`, {
          wallet,
          index,
          to: call.to,
        });
      }
    }
  }

  private async requireValidSessionKey(wallet: Address, key: Address): Promise<void> {
    requireNonZeroAddress(key, 'Session key');
    if (
      (await this.guard.isOwner(wallet, key)) ||
      (await this.module.guardianStore.isGuardian(wallet, key))
    ) {
      throw new WalletModuleError('INVALID_SESSION_KEY', 'Session key cannot be the owner or a guardian', {
        wallet,
        key,
      });
    }
  }

  private async execute(wallet: Address, calls: BatchedCall[]): Promise<Hex[]> {
    const plain: Call[] = calls.map(({ to, value, data }) => ({ to, value, data }));
    return this.module.account.execute(wallet, plain);
  }
}
