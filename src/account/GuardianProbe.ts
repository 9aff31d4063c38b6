import {
  BaseError,
  decodeFunctionResult,
  encodeFunctionData,
  parseAbi,
  type Address,
  type PublicClient,
} from 'viem';
import { GUARDIAN_PROBE_GAS } from '../constants';

export const OWNABLE_ABI = parseAbi(['function owner() view returns (address)']);

/**
 * Capability test run on prospective guardians.
 *
 * This is best effort only: a contract can answer `owner()` and still be unable
 * to act as a guardian, and nothing here can rule that out.
 */
export interface GuardianProbe {
  /** True for an EOA, or for a contract answering `owner()` within the gas stipend */
  isGuardianCapable(address: Address): Promise<boolean>;
  /** Owner reported by a contract guardian, or null when there is none */
  ownerOf(address: Address): Promise<Address | null>;
}

export interface PublicClientGuardianProbeConfig {
  publicClient: PublicClient;
  /** Gas stipend for the `owner()` call */
  gas?: bigint;
}

export class PublicClientGuardianProbe implements GuardianProbe {
  private readonly publicClient: PublicClient;
  private readonly gas: bigint;

  constructor(config: PublicClientGuardianProbeConfig) {
    this.publicClient = config.publicClient;
    this.gas = config.gas ?? GUARDIAN_PROBE_GAS;
  }

  async isGuardianCapable(address: Address): Promise<boolean> {
    const code = await this.publicClient.getCode({ address });
    if (!code || code === '0x') {
      return true;
    }
    return (await this.ownerOf(address)) !== null;
  }

  async ownerOf(address: Address): Promise<Address | null> {
    try {
      const { data } = await this.publicClient.call({
        to: address,
        data: encodeFunctionData({ abi: OWNABLE_ABI, functionName: 'owner' }),
        gas: this.gas,
      });
      if (!data || data === '0x') {
        return null;
      }
      return decodeFunctionResult({ abi: OWNABLE_ABI, functionName: 'owner', data });
    } catch (error) {
      // reverts and undecodable answers both mean "no owner()"
      if (error instanceof BaseError) {
        return null;
      }
      throw error;
    }
  }
}
