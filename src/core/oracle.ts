/**
 * Wiring of the Oracle's collaborators from a loaded configuration.
 */
import type { Config } from './config/schema.js';
import { CommunityRegistry } from './registry/client.js';
import type { RegistryReader } from './registry/types.js';
import { ChallengeStore } from './citizenship/challenge-store.js';
import { GitHubMembershipCommitter } from './citizenship/committer.js';
import { CitizenshipService } from './citizenship/service.js';
import { logger } from '../utils/logger.js';

export interface OracleContext {
  config: Config;
  registry: RegistryReader;
  citizenship: CitizenshipService;
}

export function createOracleContext(config: Config): OracleContext {
  const registry = new CommunityRegistry({
    baseUrl: config.registry.base_url,
    cacheTtlSeconds: config.registry.cache_ttl_seconds,
    timeoutMs: config.registry.timeout_ms,
  });

  const committer = new GitHubMembershipCommitter(config.github);
  if (!committer.isAvailable()) {
    logger.warn('GITHUB_TOKEN not set: confirm_citizenship cannot commit new members');
  }

  const citizenship = new CitizenshipService({
    registry,
    committer,
    store: new ChallengeStore(config.citizenship.challenge_ttl_seconds),
  });

  return { config, registry, citizenship };
}
