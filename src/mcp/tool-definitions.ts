/**
 * MCP tool definitions: the read-only concierge tools.
 * Citizenship and planned write tools are in tool-definitions-extended.ts.
 */
import { JOIN_TIERS } from '../core/onboarding/index.js';

export const npubProperty = {
  type: 'string',
  description: 'Nostr public key in bech32 form (starts with "npub1")',
};

export const coreToolDefinitions = [
  {
    name: 'about',
    description: 'Extended narration about the Honor Chain and this Oracle, assembled from the registry README and governance document',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'lookup_member',
    description: 'Look up a member by Nostr npub. Returns the full member record, or a not-found message.',
    inputSchema: {
      type: 'object',
      properties: {
        npub: npubProperty,
      },
      required: ['npub'],
    },
  },
  {
    name: 'get_tax_rate',
    description: 'Current Tollbooth tax that Authorities charge on certified purchase orders. Pass amount_sats to also compute the tax for that amount.',
    inputSchema: {
      type: 'object',
      properties: {
        amount_sats: {
          type: 'integer',
          minimum: 0,
          description: 'Purchase amount in satoshis (optional)',
        },
      },
    },
  },
  {
    name: 'get_rulebook',
    description: 'The Honor Chain governance document (raw GOVERNANCE.md from the registry)',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'how_to_join',
    description: 'Tier-specific onboarding guide: Nostr key generation, tier requirements and next steps',
    inputSchema: {
      type: 'object',
      properties: {
        tier: {
          type: 'string',
          enum: [...JOIN_TIERS],
          description: 'Only show guidance for this tier (omit for all tiers)',
        },
      },
    },
  },
  {
    name: 'who_is_first_curator',
    description: 'Identify the First Curator (Prime Authority) at the root of the Honor Chain and return their member record',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'network_versions',
    description: 'Recommended and minimum versions of every Tollbooth component, active protocols and an advisory summary',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'network_advisory',
    description: 'Current deployment advisory: recent changes, urgent upgrades and operator actions (raw ADVISORY.md)',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
