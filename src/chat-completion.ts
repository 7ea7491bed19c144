import type { Config } from "./config/env";
import type { ChatCompletionRequest } from "./types";
import type { PluginProcessor } from "./middleware/plugin-processor";
import { validateAuthHeader } from "./middleware/auth";
import { makeProviderRequest } from "./provider/client";
import { buildResponseHeaders } from "./utils/response-builder";
import { extractConversationId } from "./utils/conversation-id";
import { ClientError } from "./utils/errors";

async function readRequestBody(req: Request): Promise<ChatCompletionRequest> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new ClientError("Invalid JSON body");
  }

  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ClientError("Request body must be a JSON object");
  }
  if ("messages" in body && !Array.isArray(body.messages)) {
    throw new ClientError("messages must be an array");
  }

  return body as ChatCompletionRequest;
}

export async function handleChatCompletion(
  req: Request,
  config: Config,
  pluginProcessor: PluginProcessor
): Promise<Response> {
  const authHeader = validateAuthHeader(req, config);

  const conversationId = extractConversationId(req);
  const body = await readRequestBody(req);

  if (body.messages) {
    body.messages = pluginProcessor.processRequest(body.messages, conversationId);
  }

  body.model = config.DEFAULT_MODEL;

  const providerResponse = await makeProviderRequest(config, authHeader, body);

  if (body.stream) {
    return new Response(providerResponse.body, {
      status: providerResponse.status,
      headers: buildResponseHeaders(config, "text/event-stream"),
    });
  }

  return new Response(await providerResponse.text(), {
    status: providerResponse.status,
    headers: buildResponseHeaders(config, "application/json"),
  });
}
