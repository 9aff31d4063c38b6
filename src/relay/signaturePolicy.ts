import { WalletModuleError } from '../errors';
import { OwnerSignature, type OperationKind, type SignatureRequirement } from '../types';
import { assertNever } from './operations';

/**
 * Guardian counts the quorum of an operation depends on
 */
export interface QuorumInputs {
  /** Current number of guardians */
  guardianCount: number;
  /** Guardian count recorded when the pending recovery started (0 if none) */
  recoveryGuardianCount: number;
}

export function ceilDiv(numerator: number, denominator: number): number {
  return Math.ceil(numerator / denominator);
}

export function majorityOfGuardians(guardianCount: number): number {
  return ceilDiv(guardianCount, 2);
}

/**
 * Signature requirement of each operation kind. External relayers reproduce
 * this table for pre-flight checks, so changes here are breaking.
 */
export function getSignatureRequirement(kind: OperationKind, quorum: QuorumInputs): SignatureRequirement {
  switch (kind) {
    case 'multiCallWithSession':
      return { count: 1, ownerSignature: OwnerSignature.Session };

    case 'multiCall':
    case 'addToWhitelist':
    case 'removeFromWhitelist':
    case 'addModule':
    case 'addGuardian':
    case 'revokeGuardian':
    case 'cancelGuardianAddition':
    case 'cancelGuardianRevocation':
    case 'clearSession':
      return { count: 1, ownerSignature: OwnerSignature.Required };

    case 'executeRecovery': {
      const count = majorityOfGuardians(quorum.guardianCount);
      if (count === 0) {
        throw new WalletModuleError('NO_GUARDIANS', 'Recovery requires at least one guardian');
      }
      return { count, ownerSignature: OwnerSignature.Disallowed };
    }

    case 'cancelRecovery':
      // majority of owner + guardians at the time the recovery started
      return { count: ceilDiv(quorum.recoveryGuardianCount + 1, 2), ownerSignature: OwnerSignature.Optional };

    case 'toggleDappRegistry':
    case 'transferOwnership':
    case 'multiCallWithGuardians':
    case 'multiCallWithGuardiansAndStartSession':
      return { count: majorityOfGuardians(quorum.guardianCount) + 1, ownerSignature: OwnerSignature.Required };

    case 'finalizeRecovery':
    case 'confirmGuardianAddition':
    case 'confirmGuardianRevocation':
      return { count: 0, ownerSignature: OwnerSignature.Anyone };

    case 'lock':
    case 'unlock':
      return { count: 1, ownerSignature: OwnerSignature.Disallowed };

    default:
      return assertNever(kind);
  }
}
