import { spawn } from "node:child_process";

import { CommandError } from "../errors.js";
import { createIndentStream } from "../output.js";

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Relay the child's output to ours, indented under the current step. */
  relayOutput?: boolean;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<void>;
}

/** Runs commands to completion; there is no timeout. */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["ignore", options.relayOutput ? "pipe" : "ignore", options.relayOutput ? "pipe" : "ignore"],
      });

      if (options.relayOutput) {
        proc.stdout?.pipe(createIndentStream()).pipe(process.stdout, { end: false });
        proc.stderr?.pipe(createIndentStream()).pipe(process.stderr, { end: false });
      }

      proc.on("error", (error) => {
        reject(error);
      });

      proc.on("close", (exitCode, signal) => {
        if (exitCode === 0) {
          resolve();
          return;
        }
        reject(new CommandError([command, ...args].join(" "), exitCode, signal));
      });
    });
  }
}
