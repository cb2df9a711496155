import { describe, expect, it, vi } from "vitest";

import { createLogger } from "../observability/logger.js";
import type { FetchFn } from "./installer.js";
import { isComposerTokenValid } from "./tokenValidator.js";

const logger = createLogger({ level: "silent" });
const url = "https://api.github.test/rate_limit";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("isComposerTokenValid", () => {
  it("accepts a token when the rate limit payload lists resources", async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => jsonResponse({ resources: { core: { limit: 5000 } } }));

    await expect(isComposerTokenValid("test-token", { url, timeoutMs: 1000, fetchImpl, logger })).resolves.toBe(true);

    const [calledUrl, init] = fetchImpl.mock.calls[0];
    expect(calledUrl).toBe(url);
    expect(init?.headers).toEqual({ authorization: "token test-token" });
  });

  it("rejects a token the API refuses", async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => jsonResponse({ message: "Bad credentials" }, 401));
    await expect(isComposerTokenValid("test-token", { url, timeoutMs: 1000, fetchImpl, logger })).resolves.toBe(false);
  });

  it("treats network and parse failures as invalid", async () => {
    const offline = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });
    const garbled = vi.fn<FetchFn>(async () => new Response("<html>", { status: 200 }));

    await expect(isComposerTokenValid("test-token", { url, timeoutMs: 1000, fetchImpl: offline, logger })).resolves.toBe(
      false,
    );
    await expect(isComposerTokenValid("test-token", { url, timeoutMs: 1000, fetchImpl: garbled, logger })).resolves.toBe(
      false,
    );
  });
});
