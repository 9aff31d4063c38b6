import {
  AbiFunctionSignatureNotFoundError,
  BaseError,
  decodeFunctionData,
  encodeFunctionData,
  type Hex,
} from 'viem';
import { WalletModuleError } from '../errors';
import { WalletModuleAbi } from './abi';
import type { BatchedCall, Operation } from '../types';

/**
 * ABI-encodes an operation for relaying
 */
export function encodeOperation(op: Operation): Hex {
  switch (op.kind) {
    case 'multiCall':
    case 'multiCallWithGuardians':
      return encodeFunctionData({ abi: WalletModuleAbi, functionName: op.kind, args: [op.wallet, op.calls] });
    case 'multiCallWithSession':
      return encodeFunctionData({
        abi: WalletModuleAbi,
        functionName: 'multiCallWithSession',
        args: [op.wallet, op.session, op.calls],
      });
    case 'multiCallWithGuardiansAndStartSession':
      return encodeFunctionData({
        abi: WalletModuleAbi,
        functionName: 'multiCallWithGuardiansAndStartSession',
        args: [op.wallet, op.calls, op.sessionUser, op.duration],
      });
    case 'addToWhitelist':
    case 'removeFromWhitelist':
      return encodeFunctionData({ abi: WalletModuleAbi, functionName: op.kind, args: [op.wallet, op.target] });
    case 'addModule':
      return encodeFunctionData({ abi: WalletModuleAbi, functionName: 'addModule', args: [op.wallet, op.module] });
    case 'addGuardian':
    case 'revokeGuardian':
    case 'cancelGuardianAddition':
    case 'cancelGuardianRevocation':
    case 'confirmGuardianAddition':
    case 'confirmGuardianRevocation':
      return encodeFunctionData({ abi: WalletModuleAbi, functionName: op.kind, args: [op.wallet, op.guardian] });
    case 'executeRecovery':
      return encodeFunctionData({
        abi: WalletModuleAbi,
        functionName: 'executeRecovery',
        args: [op.wallet, op.recovery],
      });
    case 'transferOwnership':
      return encodeFunctionData({
        abi: WalletModuleAbi,
        functionName: 'transferOwnership',
        args: [op.wallet, op.newOwner],
      });
    case 'toggleDappRegistry':
      return encodeFunctionData({
        abi: WalletModuleAbi,
        functionName: 'toggleDappRegistry',
        args: [op.wallet, op.registryId, op.enabled],
      });
    case 'clearSession':
    case 'finalizeRecovery':
    case 'cancelRecovery':
    case 'lock':
    case 'unlock':
      return encodeFunctionData({ abi: WalletModuleAbi, functionName: op.kind, args: [op.wallet] });
    default:
      return assertNever(op);
  }
}

/**
 * Decodes relayed call data into an operation. Unknown selectors are rejected.
 */
export function decodeOperation(data: Hex): Operation {
  const decoded = decodeModuleCall(data);

  switch (decoded.functionName) {
    case 'multiCall':
    case 'multiCallWithGuardians': {
      const [wallet, calls] = decoded.args;
      return { kind: decoded.functionName, wallet, calls: toBatchedCalls(calls) };
    }
    case 'multiCallWithSession': {
      const [wallet, session, calls] = decoded.args;
      return {
        kind: 'multiCallWithSession',
        wallet,
        session: { key: session.key, expires: session.expires },
        calls: toBatchedCalls(calls),
      };
    }
    case 'multiCallWithGuardiansAndStartSession': {
      const [wallet, calls, sessionUser, duration] = decoded.args;
      return {
        kind: 'multiCallWithGuardiansAndStartSession',
        wallet,
        calls: toBatchedCalls(calls),
        sessionUser,
        duration,
      };
    }
    case 'addToWhitelist':
    case 'removeFromWhitelist': {
      const [wallet, target] = decoded.args;
      return { kind: decoded.functionName, wallet, target };
    }
    case 'addModule': {
      const [wallet, module] = decoded.args;
      return { kind: 'addModule', wallet, module };
    }
    case 'addGuardian':
    case 'revokeGuardian':
    case 'cancelGuardianAddition':
    case 'cancelGuardianRevocation':
    case 'confirmGuardianAddition':
    case 'confirmGuardianRevocation': {
      const [wallet, guardian] = decoded.args;
      return { kind: decoded.functionName, wallet, guardian };
    }
    case 'executeRecovery': {
      const [wallet, recovery] = decoded.args;
      return { kind: 'executeRecovery', wallet, recovery };
    }
    case 'transferOwnership': {
      const [wallet, newOwner] = decoded.args;
      return { kind: 'transferOwnership', wallet, newOwner };
    }
    case 'toggleDappRegistry': {
      const [wallet, registryId, enabled] = decoded.args;
      return { kind: 'toggleDappRegistry', wallet, registryId, enabled };
    }
    case 'clearSession':
    case 'finalizeRecovery':
    case 'cancelRecovery':
    case 'lock':
    case 'unlock': {
      const [wallet] = decoded.args;
      return { kind: decoded.functionName, wallet };
    }
    default:
      return assertNever(decoded);
  }
}

function decodeModuleCall(data: Hex) {
  try {
    return decodeFunctionData({ abi: WalletModuleAbi, data });
  } catch (error) {
    if (error instanceof AbiFunctionSignatureNotFoundError) {
      throw new WalletModuleError('UNKNOWN_OPERATION', 'Unknown operation selector', { data });
    }
    if (error instanceof BaseError) {
      throw new WalletModuleError('MALFORMED_OPERATION', `Malformed operation: ${error.shortMessage}`, { data });
    }
    throw error;
  }
}

function toBatchedCalls(
  calls: readonly { to: Hex; value: bigint; data: Hex; isSpenderInData: boolean }[],
): BatchedCall[] {
  return calls.map((call) => ({
    to: call.to,
    value: call.value,
    data: call.data,
    isSpenderInData: call.isSpenderInData,
  }));
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${JSON.stringify(value)}`);
}
