/**
 * Community Oracle MCP Server - exposes the registry concierge as MCP tools.
 * Handler implementations are in ./handlers/.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { RegistryError, ValidationError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { loadConfig, type LoadConfigOptions } from '../core/config/index.js';
import { createOracleContext, type OracleContext } from '../core/oracle.js';
import { loadTemplate, renderTemplate, repoUrl } from '../core/templates.js';
import { getString, getStringRequired, getNumber, hasArg, type McpArgs } from './arg-parser.js';
import { errorResult, type ToolResult } from './utils.js';
import { coreToolDefinitions } from './tool-definitions.js';
import { extendedToolDefinitions } from './tool-definitions-extended.js';
import {
  handleAbout,
  handleLookupMember,
  handleGetTaxRate,
  handleGetRulebook,
  handleHowToJoin,
  handleWhoIsFirstCurator,
  handleNetworkVersions,
  handleNetworkAdvisory,
  handleRequestCitizenship,
  handleConfirmCitizenship,
  handlePlannedTool,
  isPlannedTool,
} from './handlers/index.js';

const log = logger.child('mcp');

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json')));
export const VERSION =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

export const SERVER_NAME = 'community-oracle';
export const PRIMER_PROMPT = 'honor_chain_primer';

export function buildInstructions(ctx: OracleContext): string {
  return renderTemplate(loadTemplate('instructions.md'), { repo_url: repoUrl(ctx.config.github.repo) });
}

/**
 * Route one tool call to its handler. Never throws: failures become error results.
 */
export async function dispatchTool(ctx: OracleContext, name: string, args: McpArgs): Promise<ToolResult> {
  try {
    switch (name) {
      case 'about':
        return await handleAbout(ctx);

      case 'lookup_member':
        return await handleLookupMember(ctx, getStringRequired(args, 'npub'));

      case 'get_tax_rate': {
        const amountSats = getNumber(args, 'amount_sats');
        if (hasArg(args, 'amount_sats') && amountSats === undefined) {
          throw new ValidationError(ErrorCodes.INVALID_AMOUNT, 'amount_sats must be a number');
        }
        return handleGetTaxRate(ctx, { amountSats });
      }

      case 'get_rulebook':
        return await handleGetRulebook(ctx);

      case 'how_to_join':
        return handleHowToJoin(ctx, { tier: getString(args, 'tier') });

      case 'who_is_first_curator':
        return await handleWhoIsFirstCurator(ctx);

      case 'network_versions':
        return await handleNetworkVersions(ctx);

      case 'network_advisory':
        return await handleNetworkAdvisory(ctx);

      case 'request_citizenship':
        return await handleRequestCitizenship(ctx, {
          npub: getStringRequired(args, 'npub'),
          displayName: getStringRequired(args, 'display_name'),
        });

      case 'confirm_citizenship':
        return await handleConfirmCitizenship(ctx, {
          npub: getStringRequired(args, 'npub'),
          challengeId: getStringRequired(args, 'challenge_id'),
          signedEventJson: getStringRequired(args, 'signed_event_json'),
        });

      default:
        if (isPlannedTool(name)) {
          return handlePlannedTool(name);
        }
        return errorResult(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const message = errorMessage(error);
    log.warn(`Tool ${name} failed: ${message}`);

    // Point at the registry so clients can tell an outage from a bad request
    const contextInfo = error instanceof RegistryError
      ? `\n\nRegistry: ${ctx.config.registry.base_url}`
      : '';

    return errorResult(`Error: ${message}${contextInfo}`);
  }
}

/**
 * Create the MCP server with every handler registered. Does not connect a transport.
 */
export function createOracleServer(ctx: OracleContext): Server {
  const instructions = buildInstructions(ctx);
  const server = new Server(
    { name: SERVER_NAME, version: VERSION },
    { capabilities: { tools: {}, prompts: {} }, instructions }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...coreToolDefinitions, ...extendedToolDefinitions],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    log.debug(`Tool call: ${name}`);
    return dispatchTool(ctx, name, args);
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [
      {
        name: PRIMER_PROMPT,
        description: 'What the Honor Chain is and what this Oracle can answer',
      },
    ],
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name } = request.params;
    if (name !== PRIMER_PROMPT) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
    }
    return {
      messages: [{
        role: 'user' as const,
        content: { type: 'text' as const, text: instructions },
      }],
    };
  });

  return server;
}

/**
 * Load configuration, build the server and serve it over stdio.
 */
export async function startServer(options: LoadConfigOptions = {}): Promise<Server> {
  const config = await loadConfig(options);
  logger.setLevel(config.logging.level);

  const ctx = createOracleContext(config);
  const server = createOracleServer(ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info(`${SERVER_NAME} ${VERSION} listening on stdio`, { registry: config.registry.base_url });
  return server;
}
