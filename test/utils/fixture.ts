import { hexToBigInt, type Address } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { WalletModule } from '../../src/WalletModule';
import { DappRegistry } from '../../src/dapp/DappRegistry';
import { MemoryModuleRegistry } from '../../src/stores/ModuleRegistry';
import { encodeOperation } from '../../src/relay/operations';
import { relayedOperationTypedData } from '../../src/relay/eip712';
import type { CallContext, Operation, RefundParams, RelayResult, SecurityParameters } from '../../src/types';
import { ManualClock } from './ManualClock';
import { MemoryWalletAccount } from './MemoryWalletAccount';
import { StubGuardianProbe } from './StubGuardianProbe';

export const START = 1_000_000n;
export const CHAIN_ID = 1n;
export const WALLET_BALANCE = 10n ** 18n;

export const SECURITY: SecurityParameters = {
  securityPeriod: 24n,
  securityWindow: 12n,
  lockPeriod: 50n,
  recoveryPeriod: 36n,
};

export const WALLET: Address = '0x1000000000000000000000000000000000000001';
export const MODULE_ADDRESS: Address = '0x2000000000000000000000000000000000000002';
export const OTHER_MODULE: Address = '0x2000000000000000000000000000000000000003';
export const REGISTRY_OWNER: Address = '0x3000000000000000000000000000000000000003';
export const RELAYER: Address = '0x4000000000000000000000000000000000000004';
export const RECIPIENT: Address = '0x5000000000000000000000000000000000000005';
export const DAPP: Address = '0x6000000000000000000000000000000000000006';
export const TOKEN: Address = '0x7000000000000000000000000000000000000007';

export const owner = privateKeyToAccount(`0x${'11'.repeat(32)}`);
export const guardianA = privateKeyToAccount(`0x${'22'.repeat(32)}`);
export const guardianB = privateKeyToAccount(`0x${'33'.repeat(32)}`);
export const guardianC = privateKeyToAccount(`0x${'44'.repeat(32)}`);
export const sessionKey = privateKeyToAccount(`0x${'55'.repeat(32)}`);
export const newOwner = privateKeyToAccount(`0x${'66'.repeat(32)}`);
export const stranger = privateKeyToAccount(`0x${'77'.repeat(32)}`);

export const ownerCtx: CallContext = { sender: owner.address };
export const selfCtx: CallContext = { sender: MODULE_ADDRESS };

export interface Fixture {
  clock: ManualClock;
  account: MemoryWalletAccount;
  probe: StubGuardianProbe;
  moduleRegistry: MemoryModuleRegistry;
  dappRegistry: DappRegistry;
  module: WalletModule;
}

export function createFixture(): Fixture {
  const clock = new ManualClock(START);
  const account = new MemoryWalletAccount();
  account.createWallet(WALLET, owner.address, { balance: WALLET_BALANCE, modules: [MODULE_ADDRESS] });
  const probe = new StubGuardianProbe();
  const moduleRegistry = new MemoryModuleRegistry([MODULE_ADDRESS, OTHER_MODULE]);
  const dappRegistry = new DappRegistry({ owner: REGISTRY_OWNER, account, clock });
  const module = new WalletModule({
    address: MODULE_ADDRESS,
    chainId: CHAIN_ID,
    account,
    probe,
    dappRegistry,
    moduleRegistry,
    security: SECURITY,
    clock,
  });
  return { clock, account, probe, moduleRegistry, dappRegistry, module };
}

/**
 * Signers ordered by ascending address, the order guardian signatures must follow
 */
export function byAddress<T extends { address: Address }>(signers: T[]): T[] {
  return [...signers].sort((a, b) => (hexToBigInt(a.address) < hexToBigInt(b.address) ? -1 : 1));
}

/**
 * Adds guardians through the owner: the first at once, the rest confirmed
 * after the security period. Advances the clock by `securityPeriod + 1`
 * when more than one guardian is added.
 */
export async function addGuardians(fixture: Fixture, guardians: Address[]): Promise<void> {
  const { module, clock } = fixture;
  for (const guardian of guardians) {
    await module.guardians.requestAddGuardian(ownerCtx, WALLET, guardian);
  }
  if (guardians.length > 1) {
    clock.advance(SECURITY.securityPeriod + 1n);
    for (const guardian of guardians.slice(1)) {
      await module.guardians.confirmAddGuardian(ownerCtx, WALLET, guardian);
    }
  }
}

export interface RelayOptions {
  refund?: RefundParams;
  nonce?: bigint;
  ctx?: CallContext;
}

/**
 * Signs an operation with each signer, in the given order, and relays it
 */
export async function relayOperation(
  fixture: Fixture,
  operation: Operation,
  signers: PrivateKeyAccount[],
  options: RelayOptions = {},
): Promise<RelayResult> {
  const data = encodeOperation(operation);
  const nonce = options.nonce ?? fixture.module.getNonce(operation.wallet);
  const typedData = relayedOperationTypedData(
    { wallet: operation.wallet, data, nonce, refund: options.refund },
    { chainId: CHAIN_ID, module: MODULE_ADDRESS },
  );
  const signatures = await Promise.all(signers.map((signer) => signer.signTypedData(typedData)));
  return fixture.module.relay(options.ctx ?? { sender: RELAYER }, {
    wallet: operation.wallet,
    data,
    nonce,
    signatures,
    refund: options.refund,
  });
}
