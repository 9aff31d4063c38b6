import { describe, it, expect, beforeEach, vi } from 'vitest';
import { encodeFunctionData, erc20Abi, getAddress, toFunctionSelector } from 'viem';
import { DappRegistry } from '../src/dapp/DappRegistry';
import { SelectorFilter } from '../src/dapp/filters';
import type { CallContext } from '../src/types';
import { ManualClock } from './utils/ManualClock';
import { MemoryWalletAccount } from './utils/MemoryWalletAccount';
import { DAPP, MODULE_ADDRESS, RECIPIENT, REGISTRY_OWNER, START, WALLET, owner, stranger } from './utils/fixture';
import { expectCode } from './utils/expectCode';

const ownerCtx: CallContext = { sender: REGISTRY_OWNER };
const moduleCtx: CallContext = { sender: MODULE_ADDRESS };
const managerCtx: CallContext = { sender: stranger.address };

const transferData = encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [RECIPIENT, 1n] });
const approveData = encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [RECIPIENT, 1n] });
const transferOnly = () => new SelectorFilter([toFunctionSelector('function transfer(address,uint256)')]);

describe('DappRegistry', () => {
  let clock: ManualClock;
  let registry: DappRegistry;

  beforeEach(() => {
    clock = new ManualClock(START);
    const account = new MemoryWalletAccount();
    account.createWallet(WALLET, owner.address, { modules: [MODULE_ADDRESS] });
    registry = new DappRegistry({ owner: REGISTRY_OWNER, account, clock });
  });

  describe('registry selection', () => {
    it('should enable only the default registry for a new wallet', () => {
      expect(registry.getEnabledRegistryMask(WALLET)).toBe(0n);
      expect(registry.isEnabledRegistry(WALLET, 0)).toBe(true);
      expect(registry.isEnabledRegistry(WALLET, 1)).toBe(false);
    });

    it('should flip the inverted default bit when the default registry is disabled', async () => {
      await registry.toggleRegistry(moduleCtx, WALLET, 0, false);
      expect(registry.getEnabledRegistryMask(WALLET)).toBe(1n);
      expect(registry.isEnabledRegistry(WALLET, 0)).toBe(false);
    });

    it('should only accept toggles from a module authorised on the wallet', async () => {
      await expectCode(registry.toggleRegistry(ownerCtx, WALLET, 0, false), 'NOT_AUTHORISED_MODULE');
    });

    it('should validate toggles', async () => {
      await expectCode(registry.toggleRegistry(moduleCtx, WALLET, 256, true), 'INVALID_REGISTRY_ID');
      await expectCode(registry.toggleRegistry(moduleCtx, WALLET, 3, true), 'UNKNOWN_REGISTRY');
      await expectCode(registry.toggleRegistry(moduleCtx, WALLET, 0, true), 'REGISTRY_ALREADY_TOGGLED');
    });
  });

  describe('isAuthorised', () => {
    it('should authorise a dapp of the default registry once its timelock has passed', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(true);
      expect(await registry.isAuthorised(WALLET, RECIPIENT, '0x')).toBe(false);
    });

    it('should hold new dapps for the timelock period', async () => {
      await registry.requestTimelockChange(ownerCtx, 100n);
      await registry.confirmTimelockChange(ownerCtx);
      const { validAfter } = await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);

      expect(validAfter).toBe(START + 100n);
      clock.advance(99n);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(false);
      clock.advance(1n);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(true);
    });

    it('should run the filter on calls with data', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP, transferOnly());

      expect(await registry.isAuthorised(WALLET, DAPP, transferData)).toBe(true);
      expect(await registry.isAuthorised(WALLET, DAPP, approveData)).toBe(false);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(true);
    });

    it('should pass the call target to the filter', async () => {
      const isValid = vi.fn().mockReturnValue(true);
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP, { isValid });

      await registry.isAuthorised(WALLET, DAPP, approveData, RECIPIENT);
      expect(isValid).toHaveBeenCalledWith({ wallet: WALLET, spender: DAPP, to: RECIPIENT, data: approveData });
    });

    it('should ignore disabled registries', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);
      await registry.toggleRegistry(moduleCtx, WALLET, 0, false);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(false);
    });

    it('should consult custom registries the wallet enabled', async () => {
      await registry.createRegistry(ownerCtx, 5, stranger.address);
      await registry.addAuthorisationToRegistry(managerCtx, 5, DAPP);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(false);

      await registry.toggleRegistry(moduleCtx, WALLET, 5, true);
      expect(registry.getEnabledRegistryMask(WALLET)).toBe(32n);
      expect(await registry.isAuthorised(WALLET, DAPP, '0x')).toBe(true);
    });

    it('should let the lowest registry listing the dapp decide', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP, transferOnly());
      await registry.createRegistry(ownerCtx, 1, stranger.address);
      await registry.addAuthorisationToRegistry(managerCtx, 1, DAPP);
      await registry.toggleRegistry(moduleCtx, WALLET, 1, true);

      expect(await registry.isAuthorised(WALLET, DAPP, approveData)).toBe(false);
    });
  });

  describe('administration', () => {
    it('should reserve registry creation to the owner', async () => {
      await expectCode(registry.createRegistry(managerCtx, 1, stranger.address), 'NOT_REGISTRY_OWNER');
      await expectCode(registry.createRegistry(ownerCtx, 0, stranger.address), 'DUPLICATE_REGISTRY');
    });

    it('should protect the default registry from removal and manager changes', async () => {
      await expectCode(registry.removeRegistry(ownerCtx, 0), 'INVALID_REGISTRY_ID');
      await expectCode(registry.changeManager(ownerCtx, 0, stranger.address), 'INVALID_REGISTRY_ID');
    });

    it('should hand a custom registry to a new manager', async () => {
      await registry.createRegistry(ownerCtx, 2, REGISTRY_OWNER);
      await registry.changeManager(ownerCtx, 2, stranger.address);

      expect(registry.getRegistryManager(2)).toBe(stranger.address);
      await expectCode(registry.addAuthorisationToRegistry(ownerCtx, 2, DAPP), 'NOT_REGISTRY_MANAGER');
      await registry.addAuthorisationToRegistry(managerCtx, 2, DAPP);
    });

    it('should manage dapp entries', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);
      await expectCode(registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP), 'DUPLICATE_DAPP');
      await expectCode(registry.addAuthorisationToRegistry(managerCtx, 0, RECIPIENT), 'NOT_REGISTRY_MANAGER');

      await registry.removeAuthorisationFromRegistry(ownerCtx, 0, DAPP);
      expect(registry.getAuthorisation(0, DAPP)).toBeNull();
      await expectCode(registry.removeAuthorisationFromRegistry(ownerCtx, 0, DAPP), 'UNKNOWN_DAPP');
    });

    it('should apply filter updates after the timelock', async () => {
      await registry.requestTimelockChange(ownerCtx, 10n);
      await registry.confirmTimelockChange(ownerCtx);
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);
      clock.advance(10n);

      const validAfter = await registry.requestFilterUpdate(ownerCtx, 0, DAPP, transferOnly());
      expect(validAfter).toBe(START + 20n);
      await expectCode(registry.confirmFilterUpdate(managerCtx, 0, DAPP), 'FILTER_UPDATE_NOT_READY');
      expect(await registry.isAuthorised(WALLET, DAPP, approveData)).toBe(true);

      clock.advance(10n);
      await registry.confirmFilterUpdate(managerCtx, 0, DAPP);
      expect(await registry.isAuthorised(WALLET, DAPP, approveData)).toBe(false);
      await expectCode(registry.confirmFilterUpdate(managerCtx, 0, DAPP), 'NO_PENDING_FILTER_UPDATE');
    });

    it('should delay timelock changes by the current timelock', async () => {
      await expectCode(registry.confirmTimelockChange(ownerCtx), 'NO_PENDING_TIMELOCK_CHANGE');
      await registry.requestTimelockChange(ownerCtx, 50n);
      await registry.confirmTimelockChange(ownerCtx);

      const effectiveAfter = await registry.requestTimelockChange(ownerCtx, 5n);
      expect(effectiveAfter).toBe(START + 50n);
      await expectCode(registry.confirmTimelockChange(ownerCtx), 'TIMELOCK_CHANGE_NOT_READY');

      clock.advance(50n);
      await registry.confirmTimelockChange(ownerCtx);
      expect(registry.getTimelockPeriod()).toBe(5n);
    });

    it('should record dapp entries under their checksummed address', async () => {
      await registry.addAuthorisationToRegistry(ownerCtx, 0, DAPP);
      expect(registry.getAuthorisation(0, getAddress(DAPP))).toEqual({ validAfter: START, filter: null });
    });
  });
});
