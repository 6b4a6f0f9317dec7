/**
 * Tests for the in-memory challenge store.
 */
import { describe, it, expect } from 'vitest';
import { ChallengeStore, expectedContent, CHALLENGE_PREFIX } from '../../../../src/core/citizenship/challenge-store.js';

describe('ChallengeStore', () => {
  function createStore(ttlSeconds = 600) {
    const clock = { now: 1_000_000 };
    const store = new ChallengeStore(ttlSeconds, () => clock.now);
    return { store, clock };
  }

  it('should issue a challenge with a random nonce and expiry', () => {
    const { store } = createStore();

    const challenge = store.issue('npub1bob', 'Bob');

    expect(challenge.npub).toBe('npub1bob');
    expect(challenge.displayName).toBe('Bob');
    expect(challenge.nonce).toMatch(/^[0-9a-f]{64}$/);
    expect(challenge.createdAt).toBe(1_000_000);
    expect(challenge.expiresAt).toBe(1_600_000);
    expect(store.get(challenge.id)).toBe(challenge);
  });

  it('should issue distinct ids and nonces', () => {
    const { store } = createStore();

    const a = store.issue('npub1a', 'A');
    const b = store.issue('npub1b', 'B');

    expect(a.id).not.toBe(b.id);
    expect(a.nonce).not.toBe(b.nonce);
    expect(store.size).toBe(2);
  });

  it('should find a challenge by npub', () => {
    const { store } = createStore();
    const challenge = store.issue('npub1bob', 'Bob');

    expect(store.findByNpub('npub1bob')).toBe(challenge);
    expect(store.findByNpub('npub1carol')).toBeUndefined();
  });

  it('should delete a challenge', () => {
    const { store } = createStore();
    const challenge = store.issue('npub1bob', 'Bob');

    expect(store.delete(challenge.id)).toBe(true);
    expect(store.get(challenge.id)).toBeUndefined();
    expect(store.delete(challenge.id)).toBe(false);
  });

  it('should keep a challenge until its expiry instant', () => {
    const { store, clock } = createStore();
    store.issue('npub1bob', 'Bob');

    clock.now += 600_000;

    expect(store.prune()).toBe(0);
    expect(store.size).toBe(1);
  });

  it('should prune challenges past their expiry', () => {
    const { store, clock } = createStore();
    store.issue('npub1bob', 'Bob');
    clock.now += 300_000;
    store.issue('npub1carol', 'Carol');

    clock.now += 300_001;

    expect(store.prune()).toBe(1);
    expect(store.findByNpub('npub1bob')).toBeUndefined();
    expect(store.findByNpub('npub1carol')).toBeDefined();
  });
});

describe('expectedContent', () => {
  it('should prefix the nonce', () => {
    expect(CHALLENGE_PREFIX).toBe('DPYC-CITIZENSHIP:');
    expect(expectedContent({ nonce: 'abc123' })).toBe('DPYC-CITIZENSHIP:abc123');
  });
});
