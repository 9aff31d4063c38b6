import { getAddress, type Address } from 'viem';
import type { Lock, LockOrigin } from '../types';

const UNLOCKED: Lock = { releaseAfter: 0n, locker: null };

/**
 * Raw lock records. Expiry is interpreted by readers, not by the store.
 */
export class LockStore {
  private readonly locks = new Map<Address, Lock>();

  get(wallet: Address): Lock {
    return this.locks.get(getAddress(wallet)) ?? UNLOCKED;
  }

  set(wallet: Address, releaseAfter: bigint, locker: LockOrigin): void {
    this.locks.set(getAddress(wallet), { releaseAfter, locker });
  }

  clear(wallet: Address): void {
    this.locks.delete(getAddress(wallet));
  }

  /**
   * Whether the wallet holds a lock that has not yet expired
   */
  isLocked(wallet: Address, now: bigint): boolean {
    return this.get(wallet).releaseAfter > now;
  }
}
