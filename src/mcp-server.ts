#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadRecorderOptionsFromEnv } from "./config.js";
import {
  checkQueryLog,
  checkQueryLogInputSchema,
  classifySqlInputSchema,
  classifySqlStatements,
} from "./tools/query-log-tools.js";

const envOptions = loadRecorderOptionsFromEnv();

/**
 * Helper to turn a handler error into a tool error result
 */
function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return { content: [{ type: "text" as const, text: message }], isError: true };
}

const server = new McpServer(
  {
    name: "expected-queries-mcp-server",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.registerTool(
  "classify_sql",
  {
    description:
      "Classify SQL statements by operation (select/insert/update/delete) and table, the same way expected-query tests do. Statements that cannot be attributed to a table are reported with kind 'unclassified'.",
    inputSchema: classifySqlInputSchema,
  },
  async (args) => {
    const result = await classifySqlStatements({
      ...args,
      reportSubselectTables: args.reportSubselectTables ?? envOptions.reportSubselectTables,
    });
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  }
);

server.registerTool(
  "check_query_log",
  {
    description:
      "Check a log of executed SQL statements against expected query counts per table and operation (e.g. { book: { select: \"<= 2\" } }). Returns pass/fail, each violated expectation, per-table statistics and any statements that could not be classified. Use this to spot n+1 query patterns.",
    inputSchema: checkQueryLogInputSchema,
  },
  async (args) => {
    try {
      const result = await checkQueryLog({
        ...args,
        reportSubselectTables: args.reportSubselectTables ?? envOptions.reportSubselectTables,
      });
      return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
    } catch (error) {
      return errorResult(error);
    }
  }
);

// Graceful shutdown handling
async function shutdown(): Promise<void> {
  console.error("Shutting down expected queries MCP server...");
  try {
    await server.close();
  } catch (error) {
    console.error("Error during shutdown:", error);
  }
  process.exit(0);
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
process.on("SIGHUP", () => void shutdown());

process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
  void shutdown();
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled rejection at:", promise, "reason:", reason);
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Expected queries MCP server started");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
