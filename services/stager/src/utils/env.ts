import { readFileSync } from "node:fs";

export type Environment = Readonly<Record<string, string | undefined>>;

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Value of `name`, or the contents of the file `<name>_FILE` names when that is set.
 * Blank values count as unset. A `_FILE` that cannot be read is an error.
 */
export function resolveEnv(name: string, env: Environment = process.env): string | undefined {
  const file = nonBlank(env[`${name}_FILE`]);
  if (file) {
    let content: string;
    try {
      content = readFileSync(file, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`${name}_FILE names ${file}, which cannot be read: ${reason}`);
    }
    const fromFile = nonBlank(content);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  return nonBlank(env[name]);
}

/** The set keys among `keys`, resolved through {@link resolveEnv}. */
export function collectEnv<K extends string>(keys: readonly K[], env: Environment = process.env): Partial<Record<K, string>> {
  const collected: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = resolveEnv(key, env);
    if (value !== undefined) {
      collected[key] = value;
    }
  }
  return collected;
}
