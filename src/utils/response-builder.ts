import type { Config } from "../config/env";

type ContentType = "application/json" | "text/event-stream";

export function buildBaseCorsHeaders(config: Config): Record<string, string> {
  return {
    "Access-Control-Allow-Origin": config.CORS_ORIGIN,
    "Access-Control-Allow-Methods": config.CORS_METHODS,
    "Access-Control-Allow-Headers": config.CORS_HEADERS
  };
}

export function buildResponseHeaders(config: Config, contentType: ContentType): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": contentType,
    ...buildBaseCorsHeaders(config),
  };

  if (contentType === "text/event-stream") {
    headers["Cache-Control"] = "no-cache";
    headers["Connection"] = "keep-alive";
  }

  return headers;
}

export function createErrorResponse(config: Config, status: number, message: string): Response {
  return new Response(JSON.stringify({ error: message }), {
    status,
    headers: buildResponseHeaders(config, "application/json"),
  });
}
