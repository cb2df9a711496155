import { afterEach, describe, expect, it, vi } from "vitest";

import { consoleReporter, createIndentStream, printErrorLine } from "./output.js";

function collect(chunks: string[], prefix?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const stream = createIndentStream(prefix);
    let result = "";
    stream.on("data", (chunk: Buffer) => {
      result += chunk.toString("utf8");
    });
    stream.on("end", () => resolve(result));
    stream.on("error", reject);
    for (const chunk of chunks) {
      stream.write(chunk);
    }
    stream.end();
  });
}

describe("createIndentStream", () => {
  it("indents every line with seven spaces by default", async () => {
    expect(await collect(["Loading composer\nInstalling\n"])).toBe("       Loading composer\n       Installing\n");
  });

  it("keeps track of line starts across chunks", async () => {
    expect(await collect(["one\ntw", "o\n", "three"], "> ")).toBe("> one\n> two\n> three");
  });
});

describe("consoleReporter", () => {
  function spyOutput() {
    return {
      stdout: vi.spyOn(process.stdout, "write").mockReturnValue(true),
      stderr: vi.spyOn(process.stderr, "write").mockReturnValue(true),
    };
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("formats steps and warnings on stdout", () => {
    const { stdout } = spyOutput();
    consoleReporter.beginStep("Installing PHP");
    consoleReporter.warning("PHP_EXTENSIONS in options.json is deprecated.");

    expect(stdout.mock.calls.map(([chunk]) => chunk)).toEqual([
      "-----> Installing PHP\n",
      "       **WARNING** PHP_EXTENSIONS in options.json is deprecated.\n",
    ]);
  });

  it("sends errors to stderr", () => {
    const { stdout, stderr } = spyOutput();
    consoleReporter.error("composer failed");
    printErrorLine("Error:", "", "boom");

    expect(stderr.mock.calls.map(([chunk]) => chunk)).toEqual(["       **ERROR** composer failed\n", "Error: boom\n"]);
    expect(stdout).not.toHaveBeenCalled();
  });
});
