export * from './challenge-store.js';
export * from './committer.js';
export * from './nostr.js';
export * from './service.js';
