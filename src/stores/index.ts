export { MemoryGuardianStore, type GuardianStore } from './GuardianStore';
export { MemoryWhitelistStore, type WhitelistStore } from './WhitelistStore';
export { MemoryModuleRegistry, type ModuleRegistry } from './ModuleRegistry';
export { LockStore } from './LockStore';
export { SessionStore } from './SessionStore';
