import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";
import type { FetchFn } from "./installer.js";

export interface TokenCheckOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchFn;
  logger?: AppLogger;
}

function hasResources(body: unknown): boolean {
  return typeof body === "object" && body !== null && "resources" in body;
}

/**
 * Asks the GitHub rate-limit endpoint whether `token` is accepted. Any failure
 * counts as an invalid token.
 */
export async function isComposerTokenValid(token: string, options: TokenCheckOptions): Promise<boolean> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const logger = (options.logger ?? appLogger).child({ component: "token-check" });
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetchImpl(options.url, {
      method: "GET",
      headers: { authorization: `token ${token}` },
      signal: controller.signal,
    });
    const body: unknown = await response.json();
    logger.debug({ status: response.status, body }, "github rate limit");
    return hasResources(body);
  } catch (error) {
    logger.warn({ err: normalizeError(error) }, "token validation failed");
    return false;
  } finally {
    clearTimeout(timeout);
  }
}
