/**
 * Shared setup for CLI commands: config, logging and the Oracle context.
 */
import type { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import { createOracleContext, type OracleContext } from '../core/oracle.js';
import { logger } from '../utils/logger.js';

export interface GlobalOptions {
  config?: string;
  json?: boolean;
}

export async function loadContext(options: GlobalOptions): Promise<OracleContext> {
  const config = await loadConfig({ configPath: options.config });
  logger.setLevel(config.logging.level);
  return createOracleContext(config);
}

/**
 * Add the options every command shares.
 */
export function withCommonOptions(command: Command, json = true): Command {
  command.option('-c, --config <path>', 'Path to config file (default: oracle.config.yaml)');
  if (json) {
    command.option('--json', 'Output as JSON');
  }
  return command;
}

/**
 * Run a command body, logging failures and exiting non-zero.
 */
export async function runAction(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
