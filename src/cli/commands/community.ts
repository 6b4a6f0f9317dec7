/**
 * Commands that read community documents: about, member, curator, rulebook.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { buildAbout } from '../../core/about.js';
import { RegistryFiles } from '../../core/registry/index.js';
import { formatMember } from '../formatters/member.js';
import { loadContext, runAction, withCommonOptions, type GlobalOptions } from '../context.js';

export function createAboutCommand(): Command {
  return withCommonOptions(
    new Command('about').description('Narrative overview of the Honor Chain (README and governance)'),
    false
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      console.log(await buildAbout(ctx.registry));
    });
  });
}

export function createMemberCommand(): Command {
  return withCommonOptions(
    new Command('member')
      .description('Look up a member by npub')
      .argument('<npub>', 'Nostr public key (npub1...)')
  ).action(async (npub: string, options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      const member = await ctx.registry.lookupMember(npub);

      if (member === null) {
        const message = `No member found with npub: ${npub}`;
        console.log(options.json ? JSON.stringify({ error: message }, null, 2) : chalk.yellow(message));
        return;
      }
      console.log(options.json ? JSON.stringify(member, null, 2) : formatMember(member));
    });
  });
}

export function createCuratorCommand(): Command {
  return withCommonOptions(
    new Command('curator').description('Show the First Curator (Prime Authority)')
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      const curator = await ctx.registry.getFirstCurator();

      if (curator === null) {
        const message = 'No Prime Authority found in the registry.';
        console.log(options.json ? JSON.stringify({ error: message }, null, 2) : chalk.yellow(message));
        return;
      }
      console.log(options.json ? JSON.stringify(curator, null, 2) : formatMember(curator));
    });
  });
}

export function createRulebookCommand(): Command {
  return withCommonOptions(
    new Command('rulebook').description('Print the governance document'),
    false
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      const ctx = await loadContext(options);
      console.log(await ctx.registry.getText(RegistryFiles.GOVERNANCE));
    });
  });
}
