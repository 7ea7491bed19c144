import { Hono } from "hono";
import type { Config } from "./config/env";
import { handleChatCompletion } from "./chat-completion";
import type { PluginProcessor } from "./middleware/plugin-processor";
import { buildBaseCorsHeaders, createErrorResponse } from "./utils/response-builder";
import { logProxyError } from "./utils/logger";
import { ClientError } from "./utils/errors";

const CHAT_PATHS = ["/chat/completions", "/v1/chat/completions"];

export function createServer(config: Config, pluginProcessor: PluginProcessor): Hono {
  const app = new Hono();

  app.options("*", () => {
    return new Response(null, {
      status: 204,
      headers: {
        ...buildBaseCorsHeaders(config),
        "Access-Control-Max-Age": "86400"
      }
    });
  });

  app.post("/chat/completions", (c) => handleChatCompletion(c.req.raw, config, pluginProcessor));
  app.post("/v1/chat/completions", (c) => handleChatCompletion(c.req.raw, config, pluginProcessor));

  app.on(["GET", "PUT", "PATCH", "DELETE"], CHAT_PATHS, () => {
    return new Response(JSON.stringify({ error: "Method not allowed" }), {
      status: 405,
      headers: {
        "Content-Type": "application/json",
        "Allow": "POST, OPTIONS",
        ...buildBaseCorsHeaders(config)
      }
    });
  });

  app.notFound((c) => {
    return new Response(JSON.stringify({ error: "Not found", path: c.req.path }), {
      status: 404,
      headers: {
        "Content-Type": "application/json",
        ...buildBaseCorsHeaders(config)
      }
    });
  });

  app.onError((err) => {
    if (err instanceof ClientError) {
      return createErrorResponse(config, err.statusCode, err.message);
    }
    logProxyError("Server", "Unhandled error while proxying request", err);
    return createErrorResponse(config, 500, "Internal server error");
  });

  return app;
}
