/**
 * MCP tool definitions for citizenship onboarding and planned governance tools.
 */
import { npubProperty } from './tool-definitions.js';

export const extendedToolDefinitions = [
  {
    name: 'request_citizenship',
    description: `Begin a citizenship application. Issues a challenge nonce that must be signed with the applicant's nsec
(which never leaves their device) and submitted via confirm_citizenship within the expiry window.`,
    inputSchema: {
      type: 'object',
      properties: {
        npub: npubProperty,
        display_name: {
          type: 'string',
          description: 'Name to record in the registry',
        },
      },
      required: ['npub', 'display_name'],
    },
  },
  {
    name: 'confirm_citizenship',
    description: 'Complete a citizenship application with the signed Nostr event. On success the new Citizen is committed to the registry.',
    inputSchema: {
      type: 'object',
      properties: {
        npub: npubProperty,
        challenge_id: {
          type: 'string',
          description: 'challenge_id returned by request_citizenship',
        },
        signed_event_json: {
          type: 'string',
          description: 'The signed Nostr event, serialized as JSON',
        },
      },
      required: ['npub', 'challenge_id', 'signed_event_json'],
    },
  },
  {
    name: 'renounce_membership',
    description: 'Citizen self-removal from the Honor Chain. Not yet implemented.',
    inputSchema: {
      type: 'object',
      properties: {
        npub: npubProperty,
      },
      required: ['npub'],
    },
  },
  {
    name: 'initiate_ban_election',
    description: 'Open a community ban election against a member. Not yet implemented.',
    inputSchema: {
      type: 'object',
      properties: {
        target_npub: npubProperty,
        reason: {
          type: 'string',
          description: 'Why the member should be banned',
        },
      },
      required: ['target_npub', 'reason'],
    },
  },
  {
    name: 'cast_ban_vote',
    description: 'Cast a Lightning-funded vote in an active ban election. Not yet implemented.',
    inputSchema: {
      type: 'object',
      properties: {
        election_id: {
          type: 'string',
          description: 'Election identifier',
        },
        vote: {
          type: 'string',
          enum: ['ban', 'keep'],
          description: 'The ballot',
        },
        npub: npubProperty,
      },
      required: ['election_id', 'vote', 'npub'],
    },
  },
];
