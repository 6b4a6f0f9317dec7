/**
 * Commands for onboarding guidance and the tax rate.
 */
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { JOIN_TIERS, isJoinTier, renderJoinGuide, type JoinTier } from '../../core/onboarding/index.js';
import { computeTax, getTaxRate } from '../../core/tax/index.js';
import { loadContext, runAction, withCommonOptions, type GlobalOptions } from '../context.js';

interface JoinOptions extends GlobalOptions {
  tier?: JoinTier;
}

function parseTier(value: string): JoinTier {
  if (!isJoinTier(value)) {
    throw new InvalidArgumentError(`Expected one of: ${JOIN_TIERS.join(', ')}`);
  }
  return value;
}

export function createJoinCommand(): Command {
  return withCommonOptions(
    new Command('join')
      .description('How to join the Honor Chain, optionally for one tier')
      .option('-t, --tier <tier>', `Only show one tier (${JOIN_TIERS.join(', ')})`, parseTier),
    false
  ).action(async (options: JoinOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      console.log(renderJoinGuide({ repo: ctx.config.github.repo, tier: options.tier }));
    });
  });
}

interface TaxOptions extends GlobalOptions {
  amount?: number;
}

function parseAmount(value: string): number {
  const amount = Number(value);
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new InvalidArgumentError('Expected a non-negative whole number of sats');
  }
  return amount;
}

export function createTaxCommand(): Command {
  return withCommonOptions(
    new Command('tax')
      .description('Show the Tollbooth tax rate, optionally for a purchase amount')
      .option('-a, --amount <sats>', 'Purchase amount in satoshis', parseAmount)
  ).action(async (options: TaxOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      const rate = getTaxRate(ctx.config.tax);
      const taxSats = options.amount === undefined ? undefined : computeTax(options.amount, ctx.config.tax);

      if (options.json) {
        console.log(JSON.stringify(
          taxSats === undefined ? rate : { ...rate, amount_sats: options.amount, tax_sats: taxSats },
          null,
          2
        ));
        return;
      }

      console.log(`${chalk.bold('Tax rate:')} ${rate.rate_percent}% (minimum ${rate.min_sats} sats)`);
      console.log(chalk.dim(rate.note));
      if (taxSats !== undefined) {
        console.log(`${chalk.bold('Tax on')} ${options.amount} sats: ${chalk.cyan(`${taxSats} sats`)}`);
      }
    });
  });
}
