/**
 * Environment configuration
 *
 * All env var access goes through one zod schema; invalid values fail the run
 * with CONFIGURATION_ERROR before a browser is started.
 */

import { z } from 'zod';
import { createError, type ProxyConfig, type ScraperConfig } from './types.ts';
import { resolveProxyConfig } from './utils/proxy.ts';

type Env = Record<string, string | undefined>;

/**
 * 'true', '1', 'yes' are true; anything else (or unset) is false
 */
const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error', 'silent']).default('info'),
  HEADLESS: booleanStringSchema,
  DATA_DIR: z.string().min(1).default('data'),
  SCRAPEOPS_API_KEY: z.string().optional(),
  READY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SUBMIT_SETTLE_MS: z.coerce.number().int().min(0).default(3000),
  PAGE_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
});

/** Explicit settings that win over the environment; `proxy: null` disables the proxy */
export type ConfigOverrides = Partial<Omit<ScraperConfig, 'proxy'>> & { proxy?: ProxyConfig | null };

/**
 * Build the run configuration from environment variables.
 * Empty values count as unset, so a copied .env.example parses cleanly.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): ScraperConfig {
  const present: Env = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[name] = value.trim();
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw createError('CONFIGURATION_ERROR', `Invalid configuration: ${problems}`, { cause: parsed.error });
  }

  const values = parsed.data;
  const { proxy, ...rest } = overrides;
  return {
    logLevel: values.LOG_LEVEL,
    headless: values.HEADLESS,
    dataDir: values.DATA_DIR,
    scrapeOpsApiKey: values.SCRAPEOPS_API_KEY,
    readyTimeoutMs: values.READY_TIMEOUT_MS,
    submitSettleMs: values.SUBMIT_SETTLE_MS,
    pageSettleMs: values.PAGE_SETTLE_MS,
    ...rest,
    proxy: resolveProxyConfig(proxy, present),
  };
}
