import { loadConfig } from "./config/env";
import { configureLogging, logError, logInfo } from "./utils/logger";
import { createApp, createServices } from "./app";

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config.logging);

  const services = createServices(config);
  const { server } = await createApp(services, { apiToken: config.apiToken });

  server.listen(config.port, "0.0.0.0", () => {
    logInfo(`[Server] Listening on port ${config.port}`, { env: config.nodeEnv });
  });
}

main().catch((err) => {
  logError("[Server] Failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
