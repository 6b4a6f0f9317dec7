import { Command } from 'commander';
import { startServer } from '../../mcp/server.js';
import { runAction, withCommonOptions, type GlobalOptions } from '../context.js';

/**
 * Create the serve command (MCP over stdio).
 */
export function createServeCommand(): Command {
  return withCommonOptions(
    new Command('serve').description('Start the MCP server on stdio'),
    false
  ).action(async (options: GlobalOptions) => {
    await runAction(async () => {
      await startServer({ configPath: options.config });
    });
  });
}
