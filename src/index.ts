import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config/config.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { openRundex } from "./rundex/index.js";

async function main(): Promise<void> {
  const config = await loadConfig();
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";
  const opened = await openRundex({
    storageRoot: config.storageRoot(),
    databaseUrl: config.databaseUrl(),
    fallback: "pg-mem",
    autoSchema
  });

  const server = createGatewayServer({ config, rundex: opened });
  const transport = new StdioServerTransport();
  transport.onclose = () => {
    opened.close().catch((err: unknown) => console.error(err));
  };
  await server.connect(transport);
  console.error(`rebuild gateway ready [rundex=${opened.mode}, executor=${config.executorVersion()}]`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
