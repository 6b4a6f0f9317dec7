/**
 * Type-safe argument parser for MCP tool calls.
 *
 * Each getter validates the runtime type of a value in the
 * `Record<string, unknown>` provided by the MCP protocol before returning it.
 */
import { ValidationError, ErrorCodes } from '../utils/errors.js';

/** The shape of arguments received from MCP tool calls. */
export type McpArgs = Record<string, unknown> | undefined;

/**
 * Extract an optional string argument.
 * Returns `undefined` if the key is missing, null, or not a string.
 */
export function getString(args: McpArgs, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  return undefined;
}

/**
 * Extract a required, non-blank string argument.
 * Throws a ValidationError naming the argument otherwise.
 */
export function getStringRequired(args: McpArgs, key: string): string {
  const value = getString(args, key);
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(
      ErrorCodes.MISSING_ARGUMENT,
      `Required string argument "${key}" is missing or not a string`,
      { argument: key }
    );
  }
  return value;
}

/**
 * Extract an optional number argument.
 * Returns `undefined` if the key is missing, null, or not a number.
 */
export function getNumber(args: McpArgs, key: string): number | undefined {
  const value = args?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && !Number.isNaN(value)) return value;
  return undefined;
}

/**
 * Check whether a key is present and has a non-nullish value.
 */
export function hasArg(args: McpArgs, key: string): boolean {
  return args !== undefined && args[key] !== undefined && args[key] !== null;
}
