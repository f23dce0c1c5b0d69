#!/usr/bin/env node

/**
 * inference-latency-sim MCP server entry point
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { InferenceSimServer } from './server.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = getLogger(config.logging);

    logger.info('Starting inference-latency-sim MCP server', {
      version: config.mcp.serverVersion,
      backend: config.simulator.backend,
    });

    const server = new InferenceSimServer(config, logger);
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
