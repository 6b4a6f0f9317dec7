import type { z } from 'zod';
import type {
  MEMBER_ROLES,
  MemberSchema,
  MembersFileSchema,
  NetworkStatusSchema,
} from './schema.js';

export type MemberRole = (typeof MEMBER_ROLES)[number];
export type Member = z.infer<typeof MemberSchema>;
export type MembersFile = z.infer<typeof MembersFileSchema>;
export type NetworkStatus = z.infer<typeof NetworkStatusSchema>;

/** Well-known files at the root of the registry. */
export const RegistryFiles = {
  MEMBERS: 'members.json',
  README: 'README.md',
  GOVERNANCE: 'GOVERNANCE.md',
  ADVISORY: 'ADVISORY.md',
  NETWORK_STATUS: 'network-status.json',
} as const;

/**
 * Read side of the registry, as seen by tool handlers and the CLI.
 */
export interface RegistryReader {
  getText(path: string): Promise<string>;
  getMembers(): Promise<Member[]>;
  lookupMember(npub: string): Promise<Member | null>;
  getFirstCurator(): Promise<Member | null>;
  getNetworkStatus(): Promise<NetworkStatus>;
  invalidateCache(): void;
}
