/**
 * MCP tool handlers for network status (component versions and advisory).
 */
import type { OracleContext } from '../../core/oracle.js';
import { RegistryFiles } from '../../core/registry/index.js';
import { textResult, jsonResult, type ToolResult } from '../utils.js';

export async function handleNetworkVersions(ctx: OracleContext): Promise<ToolResult> {
  return jsonResult(await ctx.registry.getNetworkStatus());
}

export async function handleNetworkAdvisory(ctx: OracleContext): Promise<ToolResult> {
  return textResult(await ctx.registry.getText(RegistryFiles.ADVISORY));
}
