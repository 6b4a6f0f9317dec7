/**
 * Commands for network status: versions and advisory.
 */
import { Command } from 'commander';
import { RegistryFiles } from '../../core/registry/index.js';
import { formatNetworkStatus } from '../formatters/member.js';
import { loadContext, runAction, withCommonOptions, type GlobalOptions } from '../context.js';

export function createVersionsCommand(): Command {
  return withCommonOptions(
    new Command('versions').description('Recommended versions of Tollbooth components')
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      const status = await ctx.registry.getNetworkStatus();
      console.log(options.json ? JSON.stringify(status, null, 2) : formatNetworkStatus(status));
    });
  });
}

export function createAdvisoryCommand(): Command {
  return withCommonOptions(
    new Command('advisory').description('Current network deployment advisory'),
    false
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      console.log(await ctx.registry.getText(RegistryFiles.ADVISORY));
    });
  });
}
