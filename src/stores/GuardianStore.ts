import { getAddress, type Address } from 'viem';

/**
 * Authoritative guardian set of each wallet
 */
export interface GuardianStore {
  addGuardian(wallet: Address, guardian: Address): Promise<void>;
  revokeGuardian(wallet: Address, guardian: Address): Promise<void>;
  guardianCount(wallet: Address): Promise<number>;
  getGuardians(wallet: Address): Promise<Address[]>;
  isGuardian(wallet: Address, guardian: Address): Promise<boolean>;
}

export class MemoryGuardianStore implements GuardianStore {
  private readonly guardians = new Map<Address, Address[]>();

  async addGuardian(wallet: Address, guardian: Address): Promise<void> {
    const list = this.list(wallet);
    const normalized = getAddress(guardian);
    if (!list.includes(normalized)) {
      list.push(normalized);
    }
  }

  async revokeGuardian(wallet: Address, guardian: Address): Promise<void> {
    const list = this.list(wallet);
    const index = list.indexOf(getAddress(guardian));
    if (index >= 0) {
      // swap-and-pop, order is not significant
      list[index] = list[list.length - 1];
      list.pop();
    }
  }

  async guardianCount(wallet: Address): Promise<number> {
    return this.list(wallet).length;
  }

  async getGuardians(wallet: Address): Promise<Address[]> {
    return [...this.list(wallet)];
  }

  async isGuardian(wallet: Address, guardian: Address): Promise<boolean> {
    return this.list(wallet).includes(getAddress(guardian));
  }

  private list(wallet: Address): Address[] {
    const key = getAddress(wallet);
    let list = this.guardians.get(key);
    if (!list) {
      list = [];
      this.guardians.set(key, list);
    }
    return list;
  }
}
