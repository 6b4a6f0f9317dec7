import { Command } from 'commander';
import { VERSION } from '../mcp/server.js';
import { createServeCommand } from './commands/serve.js';
import { createAboutCommand, createMemberCommand, createCuratorCommand, createRulebookCommand } from './commands/community.js';
import { createJoinCommand, createTaxCommand } from './commands/onboarding.js';
import { createVersionsCommand, createAdvisoryCommand } from './commands/network.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('community-oracle')
    .description('Concierge for the Honor Chain community registry')
    .version(VERSION);
  [createServeCommand, createAboutCommand, createMemberCommand, createCuratorCommand, createRulebookCommand,
   createJoinCommand, createTaxCommand, createVersionsCommand, createAdvisoryCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
