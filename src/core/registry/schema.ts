/**
 * Shapes of the documents published by the community registry.
 * Records keep unknown fields so they can be returned verbatim.
 */
import { z } from 'zod';

/** Known membership tiers; the registry may introduce others. */
export const MEMBER_ROLES = ['citizen', 'operator', 'authority', 'prime_authority'] as const;

export const MemberSchema = z
  .object({
    npub: z.string().min(1),
    role: z.string().min(1),
    status: z.string().nullish(),
    display_name: z.string().nullish(),
    member_since: z.string().nullish(),
    services: z.array(z.string()).nullish(),
    upstream_authority_npub: z.string().nullish(),
    notes: z.string().nullish(),
  })
  .passthrough();

export const MembersFileSchema = z
  .object({
    members: z.array(MemberSchema),
  })
  .passthrough();

export const ComponentVersionSchema = z
  .object({
    current: z.string(),
    minimum: z.string(),
  })
  .passthrough();

export const NetworkStatusSchema = z
  .object({
    components: z.record(z.string(), ComponentVersionSchema),
    protocols: z.array(z.string()).default([]),
    last_updated: z.string().optional(),
    advisory: z.string().optional(),
  })
  .passthrough();
