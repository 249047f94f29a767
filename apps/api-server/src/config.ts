import { z } from 'zod';
import type { LogLevel } from '@epo/shared';

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  MAX_PRICE_AGE_MS: z.coerce.bigint().positive().default(3_600_000n),
  ADMIN_TOKEN: z.string().min(1).optional(),
  VERIFIER_TOKEN: z.string().min(1).optional(),
  SIMULATED_ENCLAVE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly maxPriceAgeMs: bigint;
  /** Holder of this token acts with the oracle's admin capability */
  readonly adminToken?: string;
  /** When set, registrations must come from the attestation verifier holding it */
  readonly verifierToken?: string;
  /** Register an in-process simulated enclave at start-up */
  readonly simulatedEnclave: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const c = parsed.data;
  return {
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    maxPriceAgeMs: c.MAX_PRICE_AGE_MS,
    adminToken: c.ADMIN_TOKEN,
    verifierToken: c.VERIFIER_TOKEN,
    simulatedEnclave: c.SIMULATED_ENCLAVE,
  };
}
