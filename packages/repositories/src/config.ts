// Store configuration from the environment
//
// Supports two modes:
// - In-memory (default): DATABASE_URL unset
// - Postgres: DATABASE_URL=postgres://...

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import type { EntityRepositoryOptions } from './entity-repository.js';
import { failurePolicyNamed } from './failure-policy.js';
import { createConsoleLogger, silentLogger } from './logger.js';

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  STRATA_STORE_ID: z.string().min(1).default('default'),
  STRATA_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  STRATA_FAILURE_POLICY: z.enum(['escalate', 'log']).default('escalate'),
  STRATA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type StoreConfig = {
  /**
   * Postgres connection string; absent selects the in-memory store
   */
  databaseUrl?: string;
  storeId: string;
  maxConnections: number;
  failurePolicy: 'escalate' | 'log';
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
};

/**
 * Read the store configuration.
 * Empty variables count as unset.
 *
 * @throws InvalidConfigError listing every invalid variable
 */
export function loadStoreConfig(env: Record<string, string | undefined> = process.env): StoreConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    storeId: parsed.STRATA_STORE_ID,
    maxConnections: parsed.STRATA_MAX_CONNECTIONS,
    failurePolicy: parsed.STRATA_FAILURE_POLICY,
    logLevel: parsed.STRATA_LOG_LEVEL,
  };
}

/**
 * Logger and failure policy for repositories, as configured
 */
export function repositoryOptionsFromConfig(config: StoreConfig): Required<EntityRepositoryOptions> {
  return {
    logger: config.logLevel === 'silent' ? silentLogger : createConsoleLogger({ minLevel: config.logLevel }),
    failurePolicy: failurePolicyNamed(config.failurePolicy),
  };
}
