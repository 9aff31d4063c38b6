import { getAddress, type Address } from 'viem';

/**
 * Registry of modules that wallets are allowed to authorise
 */
export interface ModuleRegistry {
  isRegisteredModule(module: Address): Promise<boolean>;
}

export class MemoryModuleRegistry implements ModuleRegistry {
  private readonly modules = new Set<Address>();

  constructor(modules: Address[] = []) {
    for (const module of modules) {
      this.registerModule(module);
    }
  }

  registerModule(module: Address): void {
    this.modules.add(getAddress(module));
  }

  deregisterModule(module: Address): void {
    this.modules.delete(getAddress(module));
  }

  async isRegisteredModule(module: Address): Promise<boolean> {
    return this.modules.has(getAddress(module));
  }
}
