function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export function extractConversationId(req: Request): string {
  const referer = req.headers.get("referer") || req.headers.get("referrer");

  if (referer) {
    const url = parseUrl(referer);
    if (url) {
      const pathSegments = url.pathname.split("/").filter(s => s);
      return `${url.hostname}:${pathSegments.join(":")}`;
    }
  }

  const customId = req.headers.get("x-conversation-id");
  if (customId) {
    return customId;
  }

  const origin = req.headers.get("origin");
  if (origin) {
    const url = parseUrl(origin);
    if (url) {
      return `${url.hostname}:default`;
    }
  }

  return "default";
}
