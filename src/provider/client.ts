import type { Config } from "../config/env";
import type { ChatCompletionRequest } from "../types";

export async function makeProviderRequest(
  config: Config,
  authHeader: string,
  body: ChatCompletionRequest
): Promise<Response> {
  const url = `${config.PROVIDER_URL}/chat/completions`;

  return fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "Authorization": authHeader,
      "HTTP-Referer": config.HTTP_REFERER,
      "X-Title": config.PROXY_TITLE,
    },
    body: JSON.stringify(body),
  });
}
