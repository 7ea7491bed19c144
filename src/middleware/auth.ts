import type { Config } from "../config/env";
import { AuthError } from "../utils/errors";

const BEARER_PREFIX = "Bearer ";
// Clients that stringify an object into the header send this literal token
const STRINGIFIED_OBJECT_TOKEN = "[object Object]";

/**
 * Returns the Authorization header to forward upstream, swapping in the
 * configured fallback key when the client sent a stringified object.
 */
export function validateAuthHeader(req: Request, config: Config): string {
  const header = req.headers.get("Authorization");

  if (!header?.startsWith(BEARER_PREFIX)) {
    throw new AuthError("Missing or invalid Authorization header");
  }

  const token = header.slice(BEARER_PREFIX.length);
  if (token !== STRINGIFIED_OBJECT_TOKEN) {
    return header;
  }

  if (!config.FALLBACK_API_KEY) {
    throw new AuthError("Malformed Authorization header and no fallback API key configured");
  }
  return `${BEARER_PREFIX}${config.FALLBACK_API_KEY}`;
}
