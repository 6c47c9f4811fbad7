/**
 * provisionkit Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { isQueryAction } from '../executor/catalog.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Poll budget schema (attempt count and delay between attempts)
 */
const budgetSchema = (defaults: { maxAttempts: number; delayMs: number }) =>
  z.object({
    maxAttempts: z.coerce.number().int().min(1).max(1000).default(defaults.maxAttempts),
    delayMs: z.coerce.number().int().min(0).max(600000).default(defaults.delayMs),
  });

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Wait after a reboot issued by a reboot-if-flagged stage
  reboot: budgetSchema({ maxAttempts: 10, delayMs: 30000 }),

  // Wait used by wait-until-ready stages
  readiness: budgetSchema({ maxAttempts: 90, delayMs: 20000 }),

  // Per-action wall clock limit for the command provider
  actionTimeoutMs: z.coerce.number().int().min(1000).max(7200000).default(1800000),

  // Executable run by the command provider for every action
  providerCommand: z.string().min(1).default('provisionkit-action'),

  // Action used to detect a responsive target
  probeAction: z
    .string()
    .min(1)
    .refine(isQueryAction, (action) => ({ message: `'${action}' is not a catalog query action` }))
    .default('ping'),
});

export type ProvisionConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): ProvisionConfig {
  const raw = {
    reboot: {
      maxAttempts: process.env['PROVISIONKIT_REBOOT_MAX_ATTEMPTS'],
      delayMs: process.env['PROVISIONKIT_REBOOT_DELAY_MS'],
    },
    readiness: {
      maxAttempts: process.env['PROVISIONKIT_READY_MAX_ATTEMPTS'],
      delayMs: process.env['PROVISIONKIT_READY_DELAY_MS'],
    },
    actionTimeoutMs: process.env['PROVISIONKIT_ACTION_TIMEOUT_MS'],
    providerCommand: process.env['PROVISIONKIT_PROVIDER_COMMAND'],
    probeAction: process.env['PROVISIONKIT_PROBE_ACTION'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      reboot: result.data.reboot,
      readiness: result.data.readiness,
      providerCommand: result.data.providerCommand,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: ProvisionConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): ProvisionConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
