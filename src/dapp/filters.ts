import { size, slice, type Address, type Hex } from 'viem';

export interface FilterInput {
  wallet: Address;
  /** The authorised contract the call is attributed to */
  spender: Address;
  /** The contract actually called */
  to: Address;
  data: Hex;
}

/**
 * Validates the payload of a call to an authorised contract
 */
export interface ValidationFilter {
  isValid(input: FilterInput): boolean | Promise<boolean>;
}

/**
 * Accepts calls whose 4-byte function selector is in the allow-list
 */
export class SelectorFilter implements ValidationFilter {
  private readonly selectors: Set<string>;

  constructor(selectors: Hex[]) {
    this.selectors = new Set(selectors.map((s) => s.toLowerCase()));
  }

  isValid({ data }: FilterInput): boolean {
    if (size(data) < 4) {
      return false;
    }
    return this.selectors.has(slice(data, 0, 4).toLowerCase());
  }
}
