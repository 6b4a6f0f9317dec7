/**
 * Community Oracle - concierge for the Honor Chain community registry.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Registry
export * from './core/registry/index.js';

// Domain
export { buildAbout } from './core/about.js';
export * from './core/tax/index.js';
export * from './core/onboarding/index.js';
export * from './core/citizenship/index.js';
export { createOracleContext } from './core/oracle.js';
export type { OracleContext } from './core/oracle.js';

// MCP
export { createOracleServer, dispatchTool, startServer } from './mcp/server.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
