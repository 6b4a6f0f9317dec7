/**
 * Tests for the planned governance tools.
 */
import { describe, it, expect } from 'vitest';
import { PLANNED_TOOLS, isPlannedTool, handlePlannedTool } from '../../../../src/mcp/handlers/planned.js';
import { NotImplementedToolError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('planned tools', () => {
  it('should list the three governance write tools', () => {
    expect(Object.keys(PLANNED_TOOLS)).toEqual(['renounce_membership', 'initiate_ban_election', 'cast_ban_vote']);
  });

  it('should recognise planned tool names only', () => {
    expect(isPlannedTool('cast_ban_vote')).toBe(true);
    expect(isPlannedTool('about')).toBe(false);
    expect(isPlannedTool('toString')).toBe(false);
  });

  it('should always throw NotImplementedToolError', () => {
    let caught: unknown;
    try {
      handlePlannedTool('cast_ban_vote');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NotImplementedToolError);
    expect(caught).toMatchObject({
      code: ErrorCodes.NOT_IMPLEMENTED,
      tool: 'cast_ban_vote',
      message: 'cast_ban_vote is not yet implemented. Planned: Lightning-funded ballots recorded with a payment proof',
    });
  });
});
