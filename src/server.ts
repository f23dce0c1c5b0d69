import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager } from './lifecycle/index.js';
import { EstimatorContext } from './backends/index.js';
import { listAllResources, readResource } from './resources/index.js';
import { listAllTools, callTool } from './tools/index.js';
import { toError } from './errors/index.js';

/**
 * Latency simulator MCP server
 * Coordinates MCP protocol handlers with the estimator context lifecycle
 */
export class InferenceSimServer {
  private server: Server;
  private lifecycle: LifecycleManager;
  private context: EstimatorContext;
  private transport?: StdioServerTransport;

  constructor(
    private readonly config: Config,
    private readonly logger: Logger
  ) {
    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    this.context = EstimatorContext.fromConfig(config, logger.child({ component: 'estimator' }));
    this.lifecycle = new LifecycleManager(logger);

    this.setupLifecycleHooks();
    this.setupMCPHandlers();
  }

  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        backend: this.config.simulator.backend,
      });
    });

    this.lifecycle.onStartup('load-estimator', async () => {
      this.context.load();
    });

    this.lifecycle.onShutdown('unload-estimator', async () => {
      this.context.unload();
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.transport.close();
      }
    });
  }

  /**
   * Setup MCP protocol handlers
   */
  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      this.logger.debug('Received list_resources request');

      try {
        const resources = await listAllResources();
        return { resources };
      } catch (error) {
        this.logger.error('Failed to list resources', toError(error));
        throw error;
      }
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      this.logger.debug('Received read_resource request', { uri });

      try {
        const contents = await readResource(uri, this.config);
        return { contents };
      } catch (error) {
        const err = toError(error);
        this.logger.error('Failed to read resource', err, { uri });
        throw new Error(`Failed to read resource ${uri}: ${err.message}`);
      }
    });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      const args = request.params.arguments;

      this.logger.debug('Received call_tool request', { tool: toolName, args });

      try {
        const result = await callTool(toolName, args, this.context);
        return { content: result.content, isError: result.isError };
      } catch (error) {
        const err = toError(error);
        this.logger.error('Failed to call tool', err, { tool: toolName });
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({ error: `Failed to execute tool ${toolName}`, message: err.message }, null, 2),
            },
          ],
          isError: true,
        };
      }
    });
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    try {
      this.lifecycle.installSignalHandlers();
      await this.lifecycle.startup();

      this.logger.info('Starting MCP server with stdio transport');
      this.transport = new StdioServerTransport();
      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', toError(error));
      throw error;
    }
  }

  getServer(): Server {
    return this.server;
  }
}
