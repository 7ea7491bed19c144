export interface Config {
  PORT: number;
  PROVIDER_URL: string;
  DEFAULT_MODEL: string;
  FALLBACK_API_KEY?: string;
  MAX_PLUGIN_TOKENS: number;
  CORS_ORIGIN: string;
  CORS_METHODS: string;
  CORS_HEADERS: string;
  HTTP_REFERER: string;
  PROXY_TITLE: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid numeric environment variable: ${key}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const providerUrl = env.PROVIDER_URL;
  const defaultModel = env.DEFAULT_MODEL;

  if (!providerUrl || !defaultModel) {
    const missing = (["PROVIDER_URL", "DEFAULT_MODEL"] as const).filter(key => !env[key]);
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  return {
    PORT: readNumber(env, "PORT", 3000),
    PROVIDER_URL: providerUrl.replace(/\/+$/, ""),
    DEFAULT_MODEL: defaultModel,
    FALLBACK_API_KEY: env.FALLBACK_API_KEY || undefined,
    MAX_PLUGIN_TOKENS: readNumber(env, "MAX_PLUGIN_TOKENS", 2000),
    CORS_ORIGIN: env.CORS_ORIGIN || "*",
    CORS_METHODS: env.CORS_METHODS || "POST, OPTIONS",
    CORS_HEADERS: env.CORS_HEADERS || "Content-Type, Authorization, HTTP-Referer, X-Title",
    HTTP_REFERER: env.HTTP_REFERER || "http://localhost",
    PROXY_TITLE: env.PROXY_TITLE || "Datetime Tidy Proxy",
  };
}
