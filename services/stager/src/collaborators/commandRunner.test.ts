import { describe, expect, it } from "vitest";

import { CommandError } from "../errors.js";
import { SpawnCommandRunner } from "./commandRunner.js";

describe("SpawnCommandRunner", () => {
  const runner = new SpawnCommandRunner();

  it("resolves when the command succeeds", async () => {
    await expect(runner.run(process.execPath, ["-e", "process.exit(0)"])).resolves.toBeUndefined();
  });

  it("rejects with the exit code when the command fails", async () => {
    const failure = runner.run(process.execPath, ["-e", "process.exit(3)"]);
    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toMatchObject({ exitCode: 3 });
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runner.run("phpstage-command-that-does-not-exist", [])).rejects.toMatchObject({ code: "ENOENT" });
  });
});
