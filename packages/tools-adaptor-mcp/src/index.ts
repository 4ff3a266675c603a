import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  BaseContextSchema,
  type Logger,
  type Part,
  type ToolDefinition,
  type ToolExecuteOptions,
  createLogger,
  errorMessageOf,
  mapWhen,
} from '@pdf-inspector/tools-core';

export type McpToolDefinition = ToolDefinition;

export interface McpServerOptions {
  name: string;
  version: string;
  description: string;
  tools: McpToolDefinition[];
}

// Only text content is produced; JSON parts travel as pretty-printed text.
type McpContent = { type: 'text'; text: string };

// A type alias, not an interface: the SDK's result type carries an index signature.
export type McpToolResponse = { content: McpContent[]; isError: boolean };

export function mapToMcpContent(parts: Part[]): McpContent[] {
  return mapWhen(parts, {
    text: (part): McpContent => ({ type: 'text', text: part.value }),
    json: (part): McpContent => ({ type: 'text', text: JSON.stringify(part.value, null, 2) }),
  });
}

/**
 * Registers every tool on the server. The tool options are validated once per
 * tool against its context schema and reused for every call.
 */
export function registerTools(
  server: McpServer,
  tools: McpToolDefinition[],
  toolOptions: ToolExecuteOptions,
  logger: Logger = createLogger('adaptor-mcp', BaseContextSchema.parse(toolOptions).logLevel),
): void {
  for (const tool of tools) {
    const { name, description, inputSchema } = tool;
    const context = tool.contextSchema.parse(toolOptions);

    const toolCallback = async (args: Record<string, unknown>): Promise<McpToolResponse> => {
      try {
        const resultParts = await tool.execute({ context, args });
        return { content: mapToMcpContent(resultParts), isError: false };
      } catch (error: unknown) {
        logger.error(`Error executing tool ${name}:`, error);
        return { content: [{ type: 'text', text: `Error: ${errorMessageOf(error)}` }], isError: true };
      }
    };

    server.tool(name, description, inputSchema.shape, toolCallback);
    logger.debug(`Registered tool ${name}`);
  }
}

export async function startMcpServer(
  serverOptions: McpServerOptions,
  toolOptions: ToolExecuteOptions,
): Promise<McpServer> {
  const { logLevel } = BaseContextSchema.parse(toolOptions);
  const logger = createLogger(serverOptions.name, logLevel);

  const server = new McpServer({
    name: serverOptions.name,
    version: serverOptions.version,
  });

  registerTools(server, serverOptions.tools, toolOptions, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`MCP server v${serverOptions.version} started on stdio. ${serverOptions.description}`);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}. Shutting down...`);
    try {
      await server.close();
    } catch (error: unknown) {
      logger.error('Error while closing the server:', error);
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  return server;
}
