import type { FastifyCorsOptions } from "@fastify/cors";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

const LOOPBACK_ALIASES: Record<string, string> = {
  localhost: "127.0.0.1",
  "127.0.0.1": "localhost"
};

const loopbackAlias = (origin: string): string | null => {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return null;
  }
  const alias = LOOPBACK_ALIASES[url.hostname];
  if (!alias) {
    return null;
  }
  url.hostname = alias;
  return url.toString().replace(/\/$/, "");
};

/**
 * Parses FRONTEND_ORIGIN (comma separated) and adds the localhost/127.0.0.1
 * twin of every loopback origin. Duplicates collapse, first occurrence wins.
 */
export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = (rawOrigin ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set(configured.length > 0 ? configured : DEFAULT_ORIGINS);
  for (const origin of [...origins]) {
    const alias = loopbackAlias(origin);
    if (alias) {
      origins.add(alias);
    }
  }
  return [...origins];
}

export const buildCorsOptions = (rawOrigin: string | undefined): FastifyCorsOptions => ({
  origin: buildAllowedFrontendOrigins(rawOrigin),
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization", "X-Request-Id"],
  exposedHeaders: ["X-Request-Id"]
});
