#!/usr/bin/env node

/**
 * MCP server for recordkit
 * Exposes the record processing engine via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { logger as engineLogger } from "@recordkit/engine";
import { toolDefinitions, toolHandlers } from "./tools.js";
import { mapErrorToMcp } from "./errors.js";
import { errorCodeOf, logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

/**
 * Create and configure the MCP server
 */
async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const toStderr = (line: string): void => console.error(line);
  engineLogger.setSink({ debug: toStderr, info: toStderr, warn: toStderr, error: toStderr });

  const enabled = process.env.MCP_RECORDKIT_ENABLED !== "false"; // Default: enabled

  if (!enabled) {
    console.error("MCP recordkit server is disabled (MCP_RECORDKIT_ENABLED=false)");
    process.exit(0);
  }

  const server = new Server(
    {
      name: "recordkit-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: toolDefinitions }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const handler = toolHandlers.get(name);
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await handler(args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCodeOf(error),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    tools: toolDefinitions.length,
    cache_size: process.env.RECORDKIT_CACHE_SIZE ?? "unbounded",
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", metrics.getAllMetrics());
    await transport.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
