/**
 * Re-exports all MCP tool handlers.
 */

// Registry documents
export { handleAbout, handleLookupMember, handleWhoIsFirstCurator, handleGetRulebook } from './community.js';

// Onboarding and tax
export { handleHowToJoin, handleGetTaxRate } from './onboarding.js';
export type { HowToJoinOptions, TaxRateOptions } from './onboarding.js';

// Network status
export { handleNetworkVersions, handleNetworkAdvisory } from './network.js';

// Citizenship
export { handleRequestCitizenship, handleConfirmCitizenship } from './citizenship.js';
export type { RequestCitizenshipOptions, ConfirmCitizenshipOptions } from './citizenship.js';

// Planned governance tools
export { PLANNED_TOOLS, isPlannedTool, handlePlannedTool } from './planned.js';
export type { PlannedTool } from './planned.js';
