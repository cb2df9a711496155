import { describe, expect, it } from "vitest";

import type { DestinationStream } from "pino";

import { CommandError, StageError } from "../errors.js";
import { createLogger, normalizeError, resolveLevel } from "./logger.js";

describe("resolveLevel", () => {
  it("defaults to info", () => {
    expect(resolveLevel({})).toBe("info");
  });

  it("prefers the phpstage variable over LOG_LEVEL", () => {
    expect(resolveLevel({ PHPSTAGE_LOG_LEVEL: " warn ", LOG_LEVEL: "error" })).toBe("warn");
    expect(resolveLevel({ LOG_LEVEL: "error" })).toBe("error");
  });

  it("switches to debug when BP_DEBUG is set", () => {
    expect(resolveLevel({ BP_DEBUG: "1", LOG_LEVEL: "error" })).toBe("debug");
  });
});

describe("normalizeError", () => {
  it("flattens the cause chain and error codes", () => {
    const error = new StageError("Installing PHP", new CommandError("tar", 2));
    expect(normalizeError(error)).toEqual({
      message: "Installing PHP: tar exited with code 2",
      name: "StageError",
      cause: { message: "tar exited with code 2", name: "CommandError" },
    });
  });

  it("keeps errno codes", () => {
    const error = Object.assign(new Error("missing"), { code: "ENOENT" });
    expect(normalizeError(error)).toEqual({ message: "missing", name: "Error", code: "ENOENT" });
  });

  it("handles non-error values", () => {
    expect(normalizeError("plain")).toEqual({ message: "plain" });
    expect(normalizeError({ a: 1 })).toEqual({ message: '{"a":1}' });
  });
});

describe("createLogger", () => {
  function capture(): DestinationStream & { lines: Array<Record<string, unknown>> } {
    const lines: Array<Record<string, unknown>> = [];
    return {
      lines,
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    };
  }

  it("labels levels and tags the service and bindings", () => {
    const destination = capture();
    const logger = createLogger({ env: {}, bindings: { subsystem: "stager" }, destination });

    logger.info({ step: "Installing PHP" }, "step completed");

    expect(destination.lines).toHaveLength(1);
    expect(destination.lines[0]).toMatchObject({
      level: "info",
      service: "phpstage",
      subsystem: "stager",
      step: "Installing PHP",
      msg: "step completed",
    });
    expect(typeof destination.lines[0].time).toBe("string");
  });

  it("drops messages below the level taken from the environment", () => {
    const destination = capture();
    const logger = createLogger({ env: { PHPSTAGE_LOG_LEVEL: "warn", PHPSTAGE_SERVICE_NAME: "supply" }, destination });

    logger.info("hidden");
    logger.warn("shown");

    expect(destination.lines.map((line) => [line.service, line.msg])).toEqual([["supply", "shown"]]);
  });
});
