import type { Address, Hex } from 'viem';
import type { Call } from '../types';

/**
 * The account contract holding funds. The module never creates or destroys one.
 */
export interface WalletAccount {
  owner(wallet: Address): Promise<Address>;
  setOwner(wallet: Address, newOwner: Address): Promise<void>;
  isAuthorisedModule(wallet: Address, module: Address): Promise<boolean>;
  authoriseModule(wallet: Address, module: Address, authorised: boolean): Promise<void>;
  /**
   * Executes the calls in order from the wallet and returns their results.
   * Must be all-or-nothing: if any call fails, none is applied and the promise rejects.
   */
  execute(wallet: Address, calls: readonly Call[]): Promise<Hex[]>;
}
