import { z } from 'zod';
import { WalletModuleError } from './errors';
import type { SecurityParameters } from './types';
import {
  DEFAULT_LOCK_PERIOD,
  DEFAULT_RECOVERY_PERIOD,
  DEFAULT_SECURITY_PERIOD,
  DEFAULT_SECURITY_WINDOW,
} from './constants';

const seconds = z.coerce.bigint().nonnegative();

export const SecurityParametersSchema = z
  .object({
    securityPeriod: seconds,
    securityWindow: seconds,
    lockPeriod: seconds,
    recoveryPeriod: seconds,
  })
  .refine((p) => p.lockPeriod >= p.recoveryPeriod, {
    message: 'lockPeriod must be at least recoveryPeriod',
    path: ['lockPeriod'],
  })
  .refine((p) => p.securityWindow === p.recoveryPeriod - p.securityPeriod, {
    message: 'securityWindow must equal recoveryPeriod - securityPeriod',
    path: ['securityWindow'],
  });

export const ConfigSchema = z.object({
  SECURITY_PERIOD: seconds.default(DEFAULT_SECURITY_PERIOD),
  SECURITY_WINDOW: seconds.default(DEFAULT_SECURITY_WINDOW),
  LOCK_PERIOD: seconds.default(DEFAULT_LOCK_PERIOD),
  RECOVERY_PERIOD: seconds.default(DEFAULT_RECOVERY_PERIOD),
  DAPP_REGISTRY_TIMELOCK: seconds.default(0n),
  CHAIN_ID: z.coerce.bigint().positive().default(1n),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface ModuleConfig {
  security: SecurityParameters;
  dappRegistryTimelock: bigint;
  chainId: bigint;
  logLevel: EnvConfig['LOG_LEVEL'];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates timing parameters, including the lock/recovery/window invariants
 */
export function parseSecurityParameters(input: unknown): SecurityParameters {
  const result = SecurityParametersSchema.safeParse(input);
  if (!result.success) {
    throw new WalletModuleError(
      'INVALID_CONFIG',
      `Invalid security parameters: ${formatIssues(result.error)}`,
      result.error.issues,
    );
  }
  return result.data;
}

/**
 * Loads module configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ModuleConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new WalletModuleError(
      'INVALID_CONFIG',
      `Invalid configuration: ${formatIssues(result.error)}`,
      result.error.issues,
    );
  }
  const parsed = result.data;
  return {
    security: parseSecurityParameters({
      securityPeriod: parsed.SECURITY_PERIOD,
      securityWindow: parsed.SECURITY_WINDOW,
      lockPeriod: parsed.LOCK_PERIOD,
      recoveryPeriod: parsed.RECOVERY_PERIOD,
    }),
    dappRegistryTimelock: parsed.DAPP_REGISTRY_TIMELOCK,
    chainId: parsed.CHAIN_ID,
    logLevel: parsed.LOG_LEVEL,
  };
}
