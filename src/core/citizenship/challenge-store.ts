/**
 * Ephemeral store of citizenship challenges. Lives in process memory only;
 * a restart discards every pending challenge.
 */
import { randomBytes, randomUUID } from 'node:crypto';

export const CHALLENGE_PREFIX = 'DPYC-CITIZENSHIP:';

export interface Challenge {
  id: string;
  npub: string;
  displayName: string;
  nonce: string;
  createdAt: number;
  expiresAt: number;
}

export class ChallengeStore {
  private challenges = new Map<string, Challenge>();

  constructor(
    readonly ttlSeconds: number = 600,
    private readonly now: () => number = Date.now
  ) {}

  issue(npub: string, displayName: string): Challenge {
    const createdAt = this.now();
    const challenge: Challenge = {
      id: randomUUID(),
      npub,
      displayName,
      nonce: randomBytes(32).toString('hex'),
      createdAt,
      expiresAt: createdAt + this.ttlSeconds * 1000,
    };
    this.challenges.set(challenge.id, challenge);
    return challenge;
  }

  get(id: string): Challenge | undefined {
    return this.challenges.get(id);
  }

  findByNpub(npub: string): Challenge | undefined {
    for (const challenge of this.challenges.values()) {
      if (challenge.npub === npub) return challenge;
    }
    return undefined;
  }

  delete(id: string): boolean {
    return this.challenges.delete(id);
  }

  /**
   * Drop expired challenges and return how many were removed.
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, challenge] of this.challenges) {
      if (now > challenge.expiresAt) {
        this.challenges.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.challenges.size;
  }
}

/**
 * Text the applicant must put in the signed event.
 */
export function expectedContent(challenge: Pick<Challenge, 'nonce'>): string {
  return `${CHALLENGE_PREFIX}${challenge.nonce}`;
}
