/**
 * Citizenship onboarding: an applicant proves ownership of an npub by
 * signing a server-issued nonce, and is then committed to the registry.
 * The nsec never leaves the applicant's device.
 */
import type { Member, RegistryReader } from '../registry/types.js';
import { ChallengeStore, expectedContent } from './challenge-store.js';
import type { MembershipCommitter } from './committer.js';
import { npubToHex, parseSignedEvent, isValidSignature, type SignedEvent } from './nostr.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('citizenship');

export const ADMISSION_NOTE = 'Admitted via Nostr signature-based citizenship onboarding';

export interface CitizenshipFailure {
  success: false;
  error: string;
}

export interface ChallengeIssued {
  success: true;
  challenge_id: string;
  nonce: string;
  expires_in_seconds: number;
  instructions: string;
}

export interface CitizenAdmitted {
  success: true;
  status: 'admitted';
  commit_url: string;
  message: string;
}

export type RequestCitizenshipResult = ChallengeIssued | CitizenshipFailure;
export type ConfirmCitizenshipResult = CitizenAdmitted | CitizenshipFailure;

export interface CitizenshipServiceDeps {
  registry: RegistryReader;
  committer: MembershipCommitter;
  store?: ChallengeStore;
  now?: () => number;
}

function fail(error: string): CitizenshipFailure {
  return { success: false, error };
}

export class CitizenshipService {
  private readonly registry: RegistryReader;
  private readonly committer: MembershipCommitter;
  private readonly store: ChallengeStore;
  private readonly now: () => number;

  constructor(deps: CitizenshipServiceDeps) {
    this.registry = deps.registry;
    this.committer = deps.committer;
    this.now = deps.now ?? Date.now;
    this.store = deps.store ?? new ChallengeStore(600, this.now);
  }

  async requestCitizenship(npub: string, displayName: string): Promise<RequestCitizenshipResult> {
    try {
      npubToHex(npub);
    } catch (error) {
      return fail(`Invalid npub: ${errorMessage(error)}`);
    }

    const name = displayName.trim();
    if (!name) {
      return fail('display_name must not be empty.');
    }

    const existing = await this.registry.lookupMember(npub);
    if (existing !== null) {
      return fail(`Already a member with role '${existing.role}'.`);
    }

    this.store.prune();
    if (this.store.findByNpub(npub)) {
      return fail(
        'A pending challenge already exists for this npub. ' +
          `Complete it or wait for it to expire (${Math.round(this.store.ttlSeconds / 60)} minutes).`
      );
    }

    const challenge = this.store.issue(npub, name);
    log.info('Issued citizenship challenge', { challengeId: challenge.id, npub });

    return {
      success: true,
      challenge_id: challenge.id,
      nonce: challenge.nonce,
      expires_in_seconds: this.store.ttlSeconds,
      instructions: signingInstructions(expectedContent(challenge)),
    };
  }

  async confirmCitizenship(
    npub: string,
    challengeId: string,
    signedEventJson: string
  ): Promise<ConfirmCitizenshipResult> {
    this.store.prune();

    const challenge = this.store.get(challengeId);
    if (!challenge) {
      return fail('Challenge not found or expired. Call request_citizenship again.');
    }
    if (challenge.npub !== npub) {
      return fail('npub does not match the challenge.');
    }

    let event: SignedEvent;
    try {
      event = parseSignedEvent(signedEventJson);
    } catch (error) {
      return fail(`Failed to parse signed event JSON: ${errorMessage(error)}`);
    }

    if (!isValidSignature(event)) {
      return fail('Schnorr signature verification failed: event id or signature is invalid.');
    }

    let claimedHex: string;
    try {
      claimedHex = npubToHex(npub);
    } catch (error) {
      return fail(`Invalid npub: ${errorMessage(error)}`);
    }
    if (event.pubkey.toLowerCase() !== claimedHex) {
      return fail('Event pubkey does not match the claimed npub.');
    }

    const expected = expectedContent(challenge);
    if (!event.content.includes(expected)) {
      return fail(`Event content must contain '${expected}'. Got: '${event.content.slice(0, 100)}'`);
    }

    // The registry may have changed since the challenge was issued.
    this.registry.invalidateCache();
    if ((await this.registry.lookupMember(npub)) !== null) {
      this.store.delete(challengeId);
      return fail('This npub was registered while your challenge was pending.');
    }

    let commitUrl: string;
    try {
      const curator = await this.registry.getFirstCurator();
      const member = this.newCitizen(npub, challenge.displayName, curator?.npub ?? null);
      commitUrl = await this.committer.addMember(
        member,
        `[Citizenship] Add ${challenge.displayName} (${npub.slice(0, 16)})`
      );
    } catch (error) {
      log.error('Failed to commit membership', error instanceof Error ? error : undefined);
      return fail(`Signature verified but membership commit failed: ${errorMessage(error)}`);
    }

    this.store.delete(challengeId);
    log.info('Admitted new citizen', { npub, commitUrl });

    return {
      success: true,
      status: 'admitted',
      commit_url: commitUrl,
      message:
        `Welcome to the Honor Chain, ${challenge.displayName}! ` +
        'Your membership has been registered. You are now a Citizen.',
    };
  }

  /** Number of challenges currently held (expired ones included until pruned). */
  pendingChallenges(): number {
    return this.store.size;
  }

  private newCitizen(npub: string, displayName: string, upstreamNpub: string | null): Member {
    return {
      npub,
      role: 'citizen',
      status: 'active',
      member_since: new Date(this.now()).toISOString().slice(0, 10),
      display_name: displayName,
      services: [],
      upstream_authority_npub: upstreamNpub,
      notes: ADMISSION_NOTE,
    };
  }
}

function signingInstructions(content: string): string {
  return [
    'Sign a Nostr event with the content shown below, then call confirm_citizenship with the signed event JSON.',
    '',
    `Required event content: ${content}`,
    '',
    'Example using nostr-tools:',
    '```js',
    "import { finalizeEvent, nip19 } from 'nostr-tools';",
    "const { data: sk } = nip19.decode('nsec1YOUR_SECRET_KEY');",
    'const event = finalizeEvent(',
    `  { kind: 1, created_at: Math.floor(Date.now() / 1000), tags: [], content: '${content}' },`,
    '  sk,',
    ');',
    'console.log(JSON.stringify(event));',
    '```',
  ].join('\n');
}
