import {
  BaseError,
  encodeFunctionData,
  erc20Abi,
  getAddress,
  hexToBigInt,
  isAddressEqual,
  recoverAddress,
  size,
  zeroAddress,
  type Address,
  type Hex,
} from 'viem';
import type { Logger } from '../logger';
import type { GuardianProbe } from '../account/GuardianProbe';
import type { GuardianManager } from '../security/GuardianManager';
import type { RecoveryManager } from '../security/RecoveryManager';
import type { LockManager } from '../security/LockManager';
import type { DappRegistry } from '../dapp/DappRegistry';
import type { SessionApproval, TransactionManager } from '../transactions/TransactionManager';
import type { ModuleContext } from '../security/ModuleContext';
import { WalletModuleError } from '../errors';
import { ETH_REFUND_GAS_OVERHEAD, ETH_TOKEN, TOKEN_REFUND_GAS_OVERHEAD } from '../constants';
import { assertNever, decodeOperation } from './operations';
import { getSignatureRequirement, majorityOfGuardians } from './signaturePolicy';
import { hashRelayedOperation, NO_REFUND } from './eip712';
import {
  OwnerSignature,
  type Call,
  type CallContext,
  type Operation,
  type RefundParams,
  type RefundReceipt,
  type RelayRequest,
  type RelayResult,
  type SignatureRequirement,
} from '../types';

export interface RelayExecutorConfig {
  chainId: bigint;
  probe: GuardianProbe;
  guardians: GuardianManager;
  recovery: RecoveryManager;
  locks: LockManager;
  dappRegistry: DappRegistry;
  transactions: TransactionManager;
}

/**
 * Executes operations approved off-chain by the wallet's owner, guardians or
 * session key, and refunds the submitter from wallet funds.
 *
 * Every check runs before the nonce is consumed. Once it is, a failing
 * operation is reported through the result and still pays its refund.
 */
export class RelayExecutor {
  private readonly logger: Logger;
  private readonly nonces = new Map<Address, bigint>();
  private readonly chainId: bigint;
  private readonly probe: GuardianProbe;
  private readonly guardians: GuardianManager;
  private readonly recovery: RecoveryManager;
  private readonly locks: LockManager;
  private readonly dappRegistry: DappRegistry;
  private readonly transactions: TransactionManager;

  constructor(
    private readonly module: ModuleContext,
    config: RelayExecutorConfig,
  ) {
    this.logger = module.logger.child({ component: 'RelayExecutor' });
    this.chainId = config.chainId;
    this.probe = config.probe;
    this.guardians = config.guardians;
    this.recovery = config.recovery;
    this.locks = config.locks;
    this.dappRegistry = config.dappRegistry;
    this.transactions = config.transactions;
  }

  /**
   * Next nonce expected for a wallet
   */
  getNonce(wallet: Address): bigint {
    return this.nonces.get(getAddress(wallet)) ?? 0n;
  }

  /**
   * Signatures needed to relay the encoded operation for a wallet
   */
  async getRequiredSignatures(wallet: Address, data: Hex): Promise<SignatureRequirement> {
    const operation = decodeOperation(data);
    this.requireMatchingWallet(wallet, operation);
    return this.resolveRequirement(operation);
  }

  async relay(ctx: CallContext, request: RelayRequest): Promise<RelayResult> {
    const startGas = ctx.gasLeft?.();
    const { wallet, data, nonce, signatures } = request;
    const refund = request.refund ?? NO_REFUND;

    const operation = decodeOperation(data);
    this.requireMatchingWallet(wallet, operation);
    if (refund.gasPrice > 0n && this.locks.isLocked(wallet)) {
      throw new WalletModuleError('LOCKED_WALLET_REFUND', 'A locked wallet cannot pay relay refunds', { wallet });
    }

    const requirement = await this.resolveSignaturePolicy(operation, signatures.length);
    this.requireNextNonce(wallet, nonce);

    const signHash = hashRelayedOperation(
      { wallet, data, nonce, refund },
      { chainId: this.chainId, module: this.module.address },
    );

    const approval: SessionApproval = requirement.ownerSignature === OwnerSignature.Session ? 'sessionKey' : 'guardians';
    if (requirement.ownerSignature === OwnerSignature.Session) {
      await this.validateSession(wallet, signHash, signatures);
    } else if (!(await this.validateSignatures(wallet, signHash, signatures, requirement.ownerSignature))) {
      throw new WalletModuleError('INVALID_SIGNATURES', 'Signatures do not satisfy the operation policy', {
        wallet,
        kind: operation.kind,
      });
    }

    const refundRecipient = isAddressEqual(refund.recipient, zeroAddress) ? ctx.sender : refund.recipient;
    const paysRefund =
      refund.gasPrice > 0n &&
      (requirement.ownerSignature === OwnerSignature.Required || requirement.ownerSignature === OwnerSignature.Session);
    if (paysRefund && requirement.count === 1 && requirement.ownerSignature === OwnerSignature.Required) {
      await this.requireAuthorisedRefundRecipient(wallet, refundRecipient);
    }

    // checked again with no await before the write
    this.requireNextNonce(wallet, nonce);
    this.nonces.set(getAddress(wallet), nonce + 1n);

    const selfCtx: CallContext = { sender: this.module.address, gasPrice: ctx.gasPrice };
    let result: RelayResult;
    try {
      const returnData = await this.dispatch(selfCtx, operation, approval);
      result = { success: true, signHash, returnData };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn({ wallet, kind: operation.kind, err: failure }, 'relayed operation failed');
      result = { success: false, signHash, returnData: [], error: failure };
    }

    if (paysRefund) {
      const gasUsed = startGas !== undefined && ctx.gasLeft ? startGas - ctx.gasLeft() : undefined;
      result.refund = await this.payRefund(ctx, wallet, refund, refundRecipient, gasUsed);
    }

    this.logger.info(
      { event: 'TransactionExecuted', wallet, kind: operation.kind, success: result.success, signHash },
      'relayed operation executed',
    );
    return result;
  }

  private requireMatchingWallet(wallet: Address, operation: Operation): void {
    if (!isAddressEqual(wallet, operation.wallet)) {
      throw new WalletModuleError('WALLET_MISMATCH', 'Operation targets a different wallet', {
        wallet,
        operationWallet: operation.wallet,
      });
    }
  }

  private requireNextNonce(wallet: Address, nonce: bigint): void {
    const expectedNonce = this.getNonce(wallet);
    if (nonce !== expectedNonce) {
      throw new WalletModuleError('INVALID_NONCE', `Expected nonce ${expectedNonce}, got ${nonce}`, { wallet, nonce });
    }
  }

  /**
   * Policy the submitted signatures are checked against. A session batch
   * carries either the session key's signature alone, or the owner's and a
   * majority of guardians', which is checked like any Required operation.
   */
  private async resolveSignaturePolicy(operation: Operation, signatureCount: number): Promise<SignatureRequirement> {
    const requirement = await this.resolveRequirement(operation);
    if (signatureCount === requirement.count) {
      return requirement;
    }
    const expected = [requirement.count];
    if (requirement.ownerSignature === OwnerSignature.Session) {
      const guardianCount = await this.guardians.guardianCount(operation.wallet);
      const count = majorityOfGuardians(guardianCount) + 1;
      if (guardianCount > 0 && signatureCount === count) {
        return { count, ownerSignature: OwnerSignature.Required };
      }
      if (guardianCount > 0) {
        expected.push(count);
      }
    }
    throw new WalletModuleError(
      'WRONG_SIGNATURE_COUNT',
      `Expected ${expected.join(' or ')} signatures, got ${signatureCount}`,
      { wallet: operation.wallet, kind: operation.kind },
    );
  }

  private async resolveRequirement(operation: Operation): Promise<SignatureRequirement> {
    return getSignatureRequirement(operation.kind, {
      guardianCount: await this.guardians.guardianCount(operation.wallet),
      recoveryGuardianCount: this.recovery.getRecovery(operation.wallet)?.guardianCount ?? 0,
    });
  }

  // --- Signatures ---

  private async recoverSigner(hash: Hex, signature: Hex): Promise<Address> {
    if (size(signature) !== 65) {
      throw new WalletModuleError('INVALID_SIGNATURES', 'Signatures must be 65 bytes', { length: size(signature) });
    }
    try {
      return await recoverAddress({ hash, signature });
    } catch (error) {
      if (error instanceof BaseError) {
        throw new WalletModuleError('INVALID_SIGNATURES', 'Malformed signature', { cause: error.shortMessage });
      }
      throw error;
    }
  }

  /**
   * Owner first when the policy asks for it, then guardians in strictly
   * ascending address order. A guardian counts once.
   */
  private async validateSignatures(
    wallet: Address,
    signHash: Hex,
    signatures: Hex[],
    ownerSignature: OwnerSignature,
  ): Promise<boolean> {
    if (signatures.length === 0) {
      return true;
    }
    const owner = await this.module.account.owner(wallet);
    const remaining = await this.module.guardianStore.getGuardians(wallet);
    let lastSigner = 0n;

    for (const [index, signature] of signatures.entries()) {
      const signer = await this.recoverSigner(signHash, signature);
      if (index === 0 && ownerSignature === OwnerSignature.Required) {
        if (isAddressEqual(signer, owner)) {
          continue;
        }
        return false;
      }
      if (index === 0 && ownerSignature === OwnerSignature.Optional && isAddressEqual(signer, owner)) {
        continue;
      }

      const position = hexToBigInt(signer);
      if (position <= lastSigner) {
        return false;
      }
      lastSigner = position;

      const match = await this.findGuardian(remaining, signer);
      if (match === -1) {
        return false;
      }
      remaining.splice(match, 1);
    }
    return true;
  }

  /**
   * Index of the guardian the signer stands for: the guardian itself, or a
   * contract guardian the signer owns
   */
  private async findGuardian(guardians: Address[], signer: Address): Promise<number> {
    const direct = guardians.findIndex((guardian) => isAddressEqual(guardian, signer));
    if (direct !== -1) {
      return direct;
    }
    for (const [index, guardian] of guardians.entries()) {
      const owner = await this.probe.ownerOf(guardian);
      if (owner && isAddressEqual(owner, signer)) {
        return index;
      }
    }
    return -1;
  }

  private async validateSession(wallet: Address, signHash: Hex, signatures: Hex[]): Promise<void> {
    const [signature] = signatures;
    if (signature === undefined) {
      throw new WalletModuleError('INVALID_SESSION', 'Session operations need one signature', { wallet });
    }
    const signer = await this.recoverSigner(signHash, signature);
    const session = this.module.sessions.getActive(wallet, this.module.clock.now());
    if (!session || !isAddressEqual(session.key, signer)) {
      throw new WalletModuleError('INVALID_SESSION', 'Signer is not the standing session key', { wallet, signer });
    }
  }

  // --- Refunds ---

  private async requireAuthorisedRefundRecipient(wallet: Address, recipient: Address): Promise<void> {
    if (
      (await this.transactions.isWhitelisted(wallet, recipient)) ||
      (await this.dappRegistry.isAuthorised(wallet, recipient, '0x'))
    ) {
      return;
    }
    throw new WalletModuleError('REFUND_NOT_AUTHORISED', 'Refund recipient is not whitelisted or authorised', {
      wallet,
      recipient,
    });
  }

  private async payRefund(
    ctx: CallContext,
    wallet: Address,
    refund: RefundParams,
    recipient: Address,
    gasUsed: bigint | undefined,
  ): Promise<RefundReceipt> {
    const isEth = isAddressEqual(refund.token, ETH_TOKEN);
    const overhead = isEth ? ETH_REFUND_GAS_OVERHEAD : TOKEN_REFUND_GAS_OVERHEAD;
    // without a gas meter the whole signed limit is refunded
    const measured = gasUsed === undefined ? refund.gasLimit : gasUsed + overhead;
    const gasConsumed = measured < refund.gasLimit ? measured : refund.gasLimit;

    let amount: bigint;
    let call: Call;
    if (isEth) {
      const txGasPrice = ctx.gasPrice ?? refund.gasPrice;
      const gasPrice = txGasPrice < refund.gasPrice ? txGasPrice : refund.gasPrice;
      amount = gasConsumed * gasPrice;
      call = { to: recipient, value: amount, data: '0x' };
    } else {
      amount = gasConsumed * refund.gasPrice;
      call = {
        to: refund.token,
        value: 0n,
        data: encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [recipient, amount] }),
      };
    }

    if (amount > 0n) {
      try {
        await this.module.account.execute(wallet, [call]);
      } catch (error) {
        throw new WalletModuleError('REFUND_FAILED', 'Refund transfer failed', { wallet, recipient, amount, error });
      }
    }
    this.logger.info({ event: 'Refund', wallet, recipient, token: refund.token, amount }, 'relayer refunded');
    return { recipient, token: refund.token, amount };
  }

  // --- Dispatch ---

  private async dispatch(ctx: CallContext, operation: Operation, approval: SessionApproval): Promise<Hex[]> {
    const { wallet } = operation;
    switch (operation.kind) {
      case 'multiCall':
        return this.transactions.multiCall(ctx, wallet, operation.calls);
      case 'multiCallWithSession':
        return this.transactions.multiCallWithSession(ctx, wallet, operation.session, operation.calls, {
          approval,
        });
      case 'multiCallWithGuardians':
        return this.transactions.multiCallWithGuardians(ctx, wallet, operation.calls);
      case 'multiCallWithGuardiansAndStartSession':
        return this.transactions.multiCallWithGuardiansAndStartSession(
          ctx,
          wallet,
          operation.calls,
          operation.sessionUser,
          operation.duration,
        );
      case 'addToWhitelist':
        await this.transactions.addToWhitelist(ctx, wallet, operation.target);
        return [];
      case 'removeFromWhitelist':
        await this.transactions.removeFromWhitelist(ctx, wallet, operation.target);
        return [];
      case 'addModule':
        await this.transactions.addModule(ctx, wallet, operation.module);
        return [];
      case 'clearSession':
        await this.transactions.clearSession(ctx, wallet);
        return [];
      case 'addGuardian':
        await this.guardians.requestAddGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'revokeGuardian':
        await this.guardians.requestRevokeGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'cancelGuardianAddition':
        await this.guardians.cancelAddGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'cancelGuardianRevocation':
        await this.guardians.cancelRevokeGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'confirmGuardianAddition':
        await this.guardians.confirmAddGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'confirmGuardianRevocation':
        await this.guardians.confirmRevokeGuardian(ctx, wallet, operation.guardian);
        return [];
      case 'executeRecovery':
        await this.recovery.executeRecovery(ctx, wallet, operation.recovery);
        return [];
      case 'finalizeRecovery':
        await this.recovery.finalizeRecovery(ctx, wallet);
        return [];
      case 'cancelRecovery':
        await this.recovery.cancelRecovery(ctx, wallet);
        return [];
      case 'transferOwnership':
        await this.recovery.transferOwnership(ctx, wallet, operation.newOwner);
        return [];
      case 'toggleDappRegistry':
        await this.dappRegistry.toggleRegistry(ctx, wallet, operation.registryId, operation.enabled);
        return [];
      case 'lock':
        await this.locks.lock(ctx, wallet);
        return [];
      case 'unlock':
        await this.locks.unlock(ctx, wallet);
        return [];
      default:
        return assertNever(operation);
    }
  }
}
