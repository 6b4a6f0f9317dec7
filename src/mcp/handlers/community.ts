/**
 * MCP tool handlers that read community documents from the registry
 * (about, lookup_member, who_is_first_curator, get_rulebook).
 */
import type { OracleContext } from '../../core/oracle.js';
import { buildAbout } from '../../core/about.js';
import { RegistryFiles } from '../../core/registry/index.js';
import { textResult, jsonResult, type ToolResult } from '../utils.js';

export async function handleAbout(ctx: OracleContext): Promise<ToolResult> {
  return textResult(await buildAbout(ctx.registry));
}

export async function handleLookupMember(ctx: OracleContext, npub: string): Promise<ToolResult> {
  const member = await ctx.registry.lookupMember(npub);
  if (member === null) {
    return textResult(`No member found with npub: ${npub}`);
  }
  return jsonResult(member);
}

export async function handleWhoIsFirstCurator(ctx: OracleContext): Promise<ToolResult> {
  const curator = await ctx.registry.getFirstCurator();
  if (curator === null) {
    return textResult('No Prime Authority found in the registry.');
  }
  return jsonResult(curator);
}

export async function handleGetRulebook(ctx: OracleContext): Promise<ToolResult> {
  return textResult(await ctx.registry.getText(RegistryFiles.GOVERNANCE));
}
