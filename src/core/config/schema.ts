import { z } from 'zod';
import { withDefaults } from '../../utils/schema.js';

export const DEFAULT_REGISTRY_BASE_URL = 'https://raw.githubusercontent.com/lonniev/dpyc-community/main';
export const DEFAULT_COMMUNITY_REPO = 'lonniev/dpyc-community';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Where registry documents are read from. */
export const RegistrySettingsSchema = z.object({
  /** Raw-content base URL; files are fetched as `<base_url>/<path>` */
  base_url: z.string().min(1).default(DEFAULT_REGISTRY_BASE_URL),
  /** Seconds a fetched document is served from cache (0 disables caching) */
  cache_ttl_seconds: z.number().int().min(0).default(300),
  timeout_ms: z.number().int().positive().default(10_000),
});

/** GitHub contents API access, used only to commit new citizens. */
export const GitHubSettingsSchema = z.object({
  repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/name"').default(DEFAULT_COMMUNITY_REPO),
  branch: z.string().min(1).default('main'),
  api_url: z.string().min(1).default('https://api.github.com'),
  token: z.string().min(1).optional(),
  timeout_ms: z.number().int().positive().default(30_000),
});

/** Tax charged by Authorities on certified purchase orders. */
export const TaxPolicySchema = z.object({
  rate_percent: z.number().min(0).max(100).default(2),
  min_sats: z.number().int().min(0).default(10),
});

export const CitizenshipSettingsSchema = z.object({
  challenge_ttl_seconds: z.number().int().positive().default(600),
});

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

export const ConfigSchema = z.object({
  registry: withDefaults(RegistrySettingsSchema),
  github: withDefaults(GitHubSettingsSchema),
  tax: withDefaults(TaxPolicySchema),
  citizenship: withDefaults(CitizenshipSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RegistrySettings = z.infer<typeof RegistrySettingsSchema>;
export type GitHubSettings = z.infer<typeof GitHubSettingsSchema>;
export type TaxPolicy = z.infer<typeof TaxPolicySchema>;
