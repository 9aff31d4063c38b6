import { getAddress, type Address } from 'viem';
import type { Session } from '../types';

/**
 * Standing session of each wallet
 */
export class SessionStore {
  private readonly sessions = new Map<Address, Session>();

  get(wallet: Address): Session | null {
    return this.sessions.get(getAddress(wallet)) ?? null;
  }

  /**
   * The session, if one exists and has not expired
   */
  getActive(wallet: Address, now: bigint): Session | null {
    const session = this.get(wallet);
    if (!session || session.expires < now) {
      return null;
    }
    return session;
  }

  set(wallet: Address, session: Session): void {
    this.sessions.set(getAddress(wallet), { key: getAddress(session.key), expires: session.expires });
  }

  clear(wallet: Address): void {
    this.sessions.delete(getAddress(wallet));
  }
}
