import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { MirrorConfigManager } from '../config/mirrorConfig.js';
import { GitHubArchiveClient } from '../api/githubArchiveClient.js';
import { MirrorError, errorMessage } from '../errors/mirrorErrors.js';
import { BaseTool, type ToolCallContext, type ToolDependencies } from '../tools/base.js';
import { MirrorSyncTool, LocalMirrorTool, CheckTool, BranchesTool, TargetsTool } from '../tools/mirror/index.js';
import { log } from '../utils/logger.js';
import { attachLogServer, detachLogServer } from '../utils/mcpLogger.js';

export interface ToolCallResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

const defaultDependencies: ToolDependencies = {
  loadConfig: () => MirrorConfigManager.getConfig(),
  createProvider: (token) => new GitHubArchiveClient({ token })
};

/**
 * MCP server exposing the mirror operations over stdio
 *
 * Tool results are returned as pretty-printed JSON text. When the caller
 * sends a progressToken, core progress is forwarded as
 * notifications/progress; a client cancellation aborts the running sync
 * between two file operations.
 */
export class MirrorServer {
  private server: Server;
  private tools: Map<string, BaseTool>;

  constructor(deps: ToolDependencies = defaultDependencies) {
    this.server = new Server(
      {
        name: 'branch-mirror',
        version: '1.0.0'
      },
      {
        capabilities: {
          tools: {},
          logging: {}
        }
      }
    );

    this.tools = MirrorServer.createTools(deps);
    this.setupHandlers();
  }

  static createTools(deps: ToolDependencies): Map<string, BaseTool> {
    const tools: BaseTool[] = [
      new MirrorSyncTool(deps),
      new LocalMirrorTool(deps),
      new CheckTool(deps),
      new BranchesTool(deps),
      new TargetsTool(deps)
    ];
    return new Map(tools.map(tool => [tool.name, tool]));
  }

  listTools(): Array<Pick<BaseTool, 'name' | 'description' | 'inputSchema' | 'annotations'>> {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      annotations: tool.annotations
    }));
  }

  /**
   * Run one tool and wrap its outcome in MCP content
   */
  async handleToolCall(
    name: string,
    args: Record<string, unknown> | undefined,
    context: ToolCallContext = {}
  ): Promise<ToolCallResult> {
    try {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new Error(`Unknown tool: ${name}`);
      }

      log.info(`Executing tool: ${name}`);
      const result = await tool.execute(args || {}, context);
      log.info(`Tool ${name} completed`);

      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }]
      };
    } catch (error) {
      log.error(`Tool ${name} failed: ${errorMessage(error)}`);

      if (error instanceof MirrorError) {
        return errorResult({
          type: error.constructor.name,
          message: error.message,
          code: error.code,
          data: error.data
        });
      }

      return errorResult({
        type: 'UnknownError',
        message: errorMessage(error) || 'An unexpected error occurred',
        stack: process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined
      });
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      const progressToken = request.params._meta?.progressToken;

      const context: ToolCallContext = { signal: extra.signal };
      if (progressToken !== undefined) {
        context.sendProgress = (progress, total, message) =>
          extra.sendNotification({
            method: 'notifications/progress',
            params: { progressToken, progress, total, message }
          });
      }

      return this.handleToolCall(name, args, context);
    });
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    log.info('Starting branch-mirror MCP server...');

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    attachLogServer(this.server);

    log.info(`branch-mirror connected and ready (${this.tools.size} tools)`);
  }

  /**
   * Stop the server gracefully
   */
  async stop(): Promise<void> {
    log.info('Stopping branch-mirror MCP server...');
    await this.server.close();
    detachLogServer();
    log.info('branch-mirror stopped');
  }
}

function errorResult(error: Record<string, unknown>): ToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
    isError: true
  };
}
