import { describe, it, expect } from 'vitest';
import { encodeFunctionData, getAddress, parseAbi, slice, toFunctionSelector } from 'viem';
import { decodeOperation, encodeOperation } from '../src/relay/operations';
import { isWalletModuleError } from '../src/errors';
import type { Operation } from '../src/types';
import { DAPP, RECIPIENT, WALLET, guardianA, sessionKey } from './utils/fixture';

function decodeError(data: `0x${string}`): unknown {
  try {
    decodeOperation(data);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('operations', () => {
  it('should encode each operation under the selector of its function', () => {
    const data = encodeOperation({ kind: 'lock', wallet: WALLET });
    expect(slice(data, 0, 4)).toBe(toFunctionSelector('function lock(address wallet)'));
  });

  it('should decode a session batch with its calls', () => {
    const operation: Operation = {
      kind: 'multiCallWithSession',
      wallet: WALLET,
      session: { key: sessionKey.address, expires: 1_000_500n },
      calls: [
        { to: RECIPIENT, value: 10n, data: '0x', isSpenderInData: false },
        { to: DAPP, value: 0n, data: '0x12345678', isSpenderInData: true },
      ],
    };

    expect(decodeOperation(encodeOperation(operation))).toEqual({
      kind: 'multiCallWithSession',
      wallet: getAddress(WALLET),
      session: { key: sessionKey.address, expires: 1_000_500n },
      calls: [
        { to: getAddress(RECIPIENT), value: 10n, data: '0x', isSpenderInData: false },
        { to: getAddress(DAPP), value: 0n, data: '0x12345678', isSpenderInData: true },
      ],
    });
  });

  it('should keep guardian operations apart when their arguments are identical', () => {
    const addition = encodeOperation({ kind: 'addGuardian', wallet: WALLET, guardian: guardianA.address });
    const confirmation = encodeOperation({ kind: 'confirmGuardianAddition', wallet: WALLET, guardian: guardianA.address });

    expect(addition).not.toBe(confirmation);
    expect(decodeOperation(confirmation)).toEqual({
      kind: 'confirmGuardianAddition',
      wallet: getAddress(WALLET),
      guardian: guardianA.address,
    });
  });

  it('should decode registry toggles with a numeric id', () => {
    const data = encodeOperation({ kind: 'toggleDappRegistry', wallet: WALLET, registryId: 7, enabled: true });
    expect(decodeOperation(data)).toEqual({
      kind: 'toggleDappRegistry',
      wallet: getAddress(WALLET),
      registryId: 7,
      enabled: true,
    });
  });

  it('should reject call data for an unknown function', () => {
    const data = encodeFunctionData({
      abi: parseAbi(['function sweep(address wallet)']),
      functionName: 'sweep',
      args: [WALLET],
    });
    expect(isWalletModuleError(decodeError(data), 'UNKNOWN_OPERATION')).toBe(true);
  });

  it('should reject truncated arguments', () => {
    const data = encodeOperation({ kind: 'transferOwnership', wallet: WALLET, newOwner: RECIPIENT });
    expect(isWalletModuleError(decodeError(slice(data, 0, 20)), 'MALFORMED_OPERATION')).toBe(true);
  });
});
