export { CommunityRegistry } from './client.js';
export type { CommunityRegistryOptions } from './client.js';
export * from './schema.js';
export * from './types.js';
