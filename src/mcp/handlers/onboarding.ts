/**
 * MCP tool handlers for onboarding guidance and the tax rate.
 */
import type { OracleContext } from '../../core/oracle.js';
import { renderJoinGuide, isJoinTier, JOIN_TIERS } from '../../core/onboarding/index.js';
import { computeTax, getTaxRate } from '../../core/tax/index.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { textResult, jsonResult, type ToolResult } from '../utils.js';

export interface HowToJoinOptions {
  tier?: string;
}

export function handleHowToJoin(ctx: OracleContext, options: HowToJoinOptions = {}): ToolResult {
  const { tier } = options;
  if (tier !== undefined && !isJoinTier(tier)) {
    throw new ValidationError(
      ErrorCodes.INVALID_ARGUMENT,
      `Unknown tier "${tier}". Expected one of: ${JOIN_TIERS.join(', ')}`,
      { tier }
    );
  }
  return textResult(renderJoinGuide({ repo: ctx.config.github.repo, tier }));
}

export interface TaxRateOptions {
  amountSats?: number;
}

export function handleGetTaxRate(ctx: OracleContext, options: TaxRateOptions = {}): ToolResult {
  const rate = getTaxRate(ctx.config.tax);
  if (options.amountSats === undefined) {
    return jsonResult(rate);
  }
  return jsonResult({
    ...rate,
    amount_sats: options.amountSats,
    tax_sats: computeTax(options.amountSats, ctx.config.tax),
  });
}
