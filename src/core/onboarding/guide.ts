/**
 * Tier-specific onboarding guide built from templates/how-to-join.md.
 */
import { loadTemplate, renderTemplate, repoUrl } from '../templates.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

export const JOIN_TIERS = ['citizen', 'operator', 'authority', 'first_curator'] as const;
export type JoinTier = (typeof JOIN_TIERS)[number];

const GUIDE_TEMPLATE = 'how-to-join.md';
const TIER_SECTION = /^##\s+.*choose your tier/i;

export function isJoinTier(value: string): value is JoinTier {
  return (JOIN_TIERS as readonly string[]).includes(value);
}

/**
 * Turn a tier heading such as "First Curator (Prime Authority)" into "first_curator".
 */
export function tierKey(heading: string): string {
  return heading
    .replace(/\(.*\)/, '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_');
}

/**
 * Keep only one tier's subsection of the "Choose Your Tier" section.
 * Every other section of the guide is returned unchanged.
 */
export function filterGuideByTier(guide: string, tier: JoinTier): string {
  const out: string[] = [];
  let inTierSection = false;
  let currentTier: string | null = null;
  let found = false;

  for (const line of guide.split('\n')) {
    if (line.startsWith('## ')) {
      inTierSection = TIER_SECTION.test(line);
      currentTier = null;
    } else if (inTierSection && line.startsWith('### ')) {
      currentTier = tierKey(line.slice(4));
      if (currentTier === tier) found = true;
    }

    if (!inTierSection || currentTier === null || currentTier === tier) {
      out.push(line);
    }
  }

  if (!found) {
    throw new ValidationError(ErrorCodes.INVALID_ARGUMENT, `No onboarding section for tier: ${tier}`, { tier });
  }
  return out.join('\n');
}

export interface JoinGuideOptions {
  /** GitHub "owner/name" of the community registry */
  repo: string;
  tier?: JoinTier;
}

export function renderJoinGuide(options: JoinGuideOptions): string {
  const guide = renderTemplate(loadTemplate(GUIDE_TEMPLATE), { repo_url: repoUrl(options.repo) });
  return options.tier ? filterGuideByTier(guide, options.tier) : guide;
}
