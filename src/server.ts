import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createApp, createAppServer } from "./app.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { logger, moduleLogger, setLogLevel } from "./infra/logging/logger.js";
import { MCP_PATH, McpHttpGateway } from "./transport/httpGateway.js";

const log = moduleLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = await createApp(config);
  const shutdownTasks: Array<() => Promise<void>> = [app.close];

  if (config.transport === "http") {
    const gateway = new McpHttpGateway(app, moduleLogger("http"));
    const address = await gateway.listen(config.port, config.host);
    shutdownTasks.unshift(() => gateway.close());
    log.info("MCP HTTP server listening", {
      url: `http://${config.host}:${address.port}${MCP_PATH}`,
    });
  } else {
    await createAppServer(app).connect(new StdioServerTransport());
    log.info("MCP stdio server ready");
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info("Shutting down");
    try {
      for (const task of shutdownTasks) {
        await task();
      }
      process.exit(0);
    } catch (error) {
      log.error("Shutdown failed", { error: describeError(error) });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("Failed to start MCP server", { error: describeError(error) });
  process.exit(1);
});
