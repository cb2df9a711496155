import type { StagingDirs } from "@phpstage/stager";

export const COMMANDS = ["supply", "finalize"] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface StagingInvocation {
  command: CommandName;
  dirs: StagingDirs;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isCommandName(value: string | undefined): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseStagingArgs(argv: readonly string[]): StagingInvocation {
  const [command, ...rest] = argv;
  if (!isCommandName(command)) {
    throw new UsageError(command ? `Unknown command "${command}"` : "A command is required");
  }
  if (rest.length !== 4) {
    throw new UsageError(`${command} expects 4 arguments, got ${rest.length}`);
  }
  const [buildDir, cacheDir, depsDir, depsIdx] = rest.map((arg) => arg.trim());
  for (const [label, value] of [
    ["build dir", buildDir],
    ["cache dir", cacheDir],
    ["deps dir", depsDir],
  ] as const) {
    if (!value) {
      throw new UsageError(`${label} must not be empty`);
    }
  }
  if (!/^\d+$/.test(depsIdx)) {
    throw new UsageError(`deps index must be a non-negative integer, got "${depsIdx}"`);
  }
  return { command, dirs: { buildDir, cacheDir, depsDir, depsIdx } };
}
