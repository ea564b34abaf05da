import inject from "light-my-request";
import type { buildApp } from "../src/app.js";
import type { AppConfig } from "../src/config.js";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    PORT: 8080,
    BASE_URL: "http://localhost:8080",
    HTTP_JSON_BODY_LIMIT_BYTES: 40 * 1024 * 1024,
    TRUST_PROXY: false,
    RATE_LIMIT_WINDOW_MS: 60_000,
    RATE_LIMIT_MAX: 1000,
    REPORT_CACHE_LIMIT: 10,
    PREVIEW_FINDINGS_LIMIT: 25,
    LOG_LEVEL: "silent",
    VERSION: "test",
    ...overrides
  };
}

export async function jsonRequest(
  app: ReturnType<typeof buildApp>,
  args: {
    method: "GET" | "POST";
    url: string;
    headers?: Record<string, string>;
    payload?: unknown;
  }
): Promise<{ statusCode: number; headers: Record<string, unknown>; body: any }> {
  const headers: Record<string, string> = {
    ...(args.headers || {})
  };

  let payload: string | undefined;
  if (args.payload !== undefined) {
    headers["content-type"] = "application/json";
    payload = JSON.stringify(args.payload);
  }

  const res = await inject(app, {
    method: args.method,
    url: args.url,
    headers,
    payload
  });

  return {
    statusCode: res.statusCode,
    headers: res.headers,
    body: res.payload.length ? res.json() : {}
  };
}
