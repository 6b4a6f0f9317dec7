/**
 * Governance write tools that are announced but not built.
 * Each one always fails with NotImplementedToolError.
 */
import { NotImplementedToolError } from '../../utils/errors.js';

export const PLANNED_TOOLS = {
  renounce_membership: 'automated pull request removing the member from members.json',
  initiate_ban_election: 'ban election issue with a 72-hour discussion period and economic voting',
  cast_ban_vote: 'Lightning-funded ballots recorded with a payment proof',
} as const;

export type PlannedTool = keyof typeof PLANNED_TOOLS;

export function isPlannedTool(name: string): name is PlannedTool {
  return Object.prototype.hasOwnProperty.call(PLANNED_TOOLS, name);
}

export function handlePlannedTool(name: PlannedTool): never {
  throw new NotImplementedToolError(name, PLANNED_TOOLS[name]);
}
