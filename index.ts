#!/usr/bin/env node

import {
  StdioServerTransport,
} from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, loadEnvFile, type ServerConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { LinearBClient } from "./linearb-client.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";

async function main() {
  let config: ServerConfig;
  try {
    loadEnvFile();
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger("LinearB MCP", config.logLevel);
  logger.info("Starting LinearB MCP Server...");

  const client = new LinearBClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    logger: createLogger("LinearB API", config.logLevel),
  });

  const server = createServer({
    transport: client,
    baseUrl: config.baseUrl,
    logger,
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    void server
      .close()
      .catch((error: unknown) =>
        logger.error(`Error during shutdown: ${errorMessage(error)}`),
      )
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  logger.debug("Connecting server to transport...");
  await server.connect(transport);
  logger.info("LinearB MCP Server running on stdio");
}

main().catch((error: unknown) => {
  console.error("Fatal error in main():", errorMessage(error));
  process.exit(1);
});
