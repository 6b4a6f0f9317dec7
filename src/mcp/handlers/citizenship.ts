/**
 * MCP tool handlers for citizenship onboarding.
 * Failed applications are ordinary results ({ success: false }), not tool errors.
 */
import type { OracleContext } from '../../core/oracle.js';
import { jsonResult, type ToolResult } from '../utils.js';

export interface RequestCitizenshipOptions {
  npub: string;
  displayName: string;
}

export async function handleRequestCitizenship(
  ctx: OracleContext,
  options: RequestCitizenshipOptions
): Promise<ToolResult> {
  return jsonResult(await ctx.citizenship.requestCitizenship(options.npub, options.displayName));
}

export interface ConfirmCitizenshipOptions {
  npub: string;
  challengeId: string;
  signedEventJson: string;
}

export async function handleConfirmCitizenship(
  ctx: OracleContext,
  options: ConfirmCitizenshipOptions
): Promise<ToolResult> {
  return jsonResult(
    await ctx.citizenship.confirmCitizenship(options.npub, options.challengeId, options.signedEventJson)
  );
}
