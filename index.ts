import { config as loadDotenv } from "dotenv";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { serve } from "@hono/node-server";
import { loadConfig } from "./src/config/env";
import { createServer } from "./src/server";
import { PluginProcessor } from "./src/middleware/plugin-processor";

const rootDir = dirname(fileURLToPath(import.meta.url));
loadDotenv({ path: resolve(rootDir, ".env") });

try {
  const config = loadConfig();

  const pluginProcessor = new PluginProcessor();
  await pluginProcessor.load(resolve(rootDir, "plugins"), config.MAX_PLUGIN_TOKENS);

  const app = createServer(config, pluginProcessor);

  serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    console.log(`Datetime Tidy running on http://localhost:${info.port} | Provider: ${config.PROVIDER_URL} | Model: ${config.DEFAULT_MODEL} | Plugins: ${pluginProcessor.pluginCount()}`);
  });
} catch (error) {
  console.error(`Failed to start server: ${error instanceof Error ? error.message : "Unknown error"}`);
  process.exit(1);
}
