import { getAddress, type Address } from 'viem';

/**
 * Per-wallet whitelist: target address to activation timestamp (0 = absent)
 */
export interface WhitelistStore {
  getWhitelist(wallet: Address, target: Address): Promise<bigint>;
  setWhitelist(wallet: Address, target: Address, whitelistAfter: bigint): Promise<void>;
}

export class MemoryWhitelistStore implements WhitelistStore {
  private readonly entries = new Map<string, bigint>();

  async getWhitelist(wallet: Address, target: Address): Promise<bigint> {
    return this.entries.get(this.key(wallet, target)) ?? 0n;
  }

  async setWhitelist(wallet: Address, target: Address, whitelistAfter: bigint): Promise<void> {
    if (whitelistAfter === 0n) {
      this.entries.delete(this.key(wallet, target));
    } else {
      this.entries.set(this.key(wallet, target), whitelistAfter);
    }
  }

  private key(wallet: Address, target: Address): string {
    return `${getAddress(wallet)}:${getAddress(target)}`;
  }
}
