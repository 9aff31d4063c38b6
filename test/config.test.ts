import { describe, it, expect } from 'vitest';
import { loadConfig, parseSecurityParameters } from '../src/config';
import { isWalletModuleError } from '../src/errors';

function configError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('config', () => {
  it('should default to the production timings', () => {
    expect(loadConfig({})).toEqual({
      security: {
        securityPeriod: 86400n,
        securityWindow: 86400n,
        lockPeriod: 432000n,
        recoveryPeriod: 172800n,
      },
      dappRegistryTimelock: 0n,
      chainId: 1n,
      logLevel: 'info',
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      SECURITY_PERIOD: '10',
      SECURITY_WINDOW: '20',
      LOCK_PERIOD: '40',
      RECOVERY_PERIOD: '30',
      DAPP_REGISTRY_TIMELOCK: '7',
      CHAIN_ID: '10',
      LOG_LEVEL: 'debug',
    });

    expect(config.security).toEqual({ securityPeriod: 10n, securityWindow: 20n, lockPeriod: 40n, recoveryPeriod: 30n });
    expect(config.dappRegistryTimelock).toBe(7n);
    expect(config.chainId).toBe(10n);
    expect(config.logLevel).toBe('debug');
  });

  it('should require the lock to outlast the recovery period', () => {
    const error = configError(() =>
      parseSecurityParameters({ securityPeriod: 10n, securityWindow: 20n, lockPeriod: 29n, recoveryPeriod: 30n }),
    );
    expect(isWalletModuleError(error, 'INVALID_CONFIG')).toBe(true);
  });

  it('should require the security window to close when the recovery period ends', () => {
    const error = configError(() =>
      parseSecurityParameters({ securityPeriod: 10n, securityWindow: 5n, lockPeriod: 40n, recoveryPeriod: 30n }),
    );
    expect(isWalletModuleError(error, 'INVALID_CONFIG')).toBe(true);
    expect(error instanceof Error ? error.message : '').toBe(
      'Invalid security parameters: securityWindow: securityWindow must equal recoveryPeriod - securityPeriod',
    );
  });

  it('should reject malformed environment values', () => {
    expect(isWalletModuleError(configError(() => loadConfig({ LOCK_PERIOD: 'soon' })), 'INVALID_CONFIG')).toBe(true);
    expect(isWalletModuleError(configError(() => loadConfig({ LOG_LEVEL: 'loud' })), 'INVALID_CONFIG')).toBe(true);
  });
});
