import { access, readFile } from "node:fs/promises";
import path from "node:path";

import type { VersionCandidate, VersionRequest } from "@phpstage/synth";
import type { z } from "zod";

import { ConfigSourceError } from "../errors.js";
import { collectEnv, type Environment } from "../utils/env.js";
import {
  ComposerFileSchema,
  OptionsFileSchema,
  STAGER_ENV_KEYS,
  StagerEnvSchema,
  type ComposerFile,
  type OptionsFile,
  type StagerSettings,
} from "./schema.js";

export const OPTIONS_FILE = path.join(".bp-config", "options.json");
export const COMPOSER_FILE = "composer.json";

export interface ComposerSource {
  path: string;
  content: ComposerFile;
}

export interface DeclarativeSources {
  optionsPath: string;
  /** Empty when the app ships no options file. */
  options: OptionsFile;
  composer?: ComposerSource;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Reads and validates a JSON source. A missing file yields `undefined`; a file
 * that is not valid JSON or does not fit the schema is fatal.
 */
export async function readJsonSource<T>(
  file: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | undefined> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigSourceError(file, error instanceof Error ? error : new Error(String(error)));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigSourceError(file, new Error(describeIssues(result.error.issues)), "schema");
  }
  return result.data;
}

/** `$COMPOSER_PATH/composer.json` wins over the one at the build root. */
export async function findComposerFile(buildDir: string, composerPath?: string): Promise<string | undefined> {
  if (composerPath) {
    const candidate = path.join(buildDir, composerPath, COMPOSER_FILE);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  const atRoot = path.join(buildDir, COMPOSER_FILE);
  return (await fileExists(atRoot)) ? atRoot : undefined;
}

export async function loadDeclarativeSources(
  buildDir: string,
  settings: Partial<Pick<StagerSettings, "composerPath">>,
): Promise<DeclarativeSources> {
  const optionsPath = path.join(buildDir, OPTIONS_FILE);
  const options = (await readJsonSource(optionsPath, OptionsFileSchema)) ?? {};

  const composerPath = await findComposerFile(buildDir, settings.composerPath);
  if (!composerPath) {
    return { optionsPath, options };
  }
  const content = (await readJsonSource(composerPath, ComposerFileSchema)) ?? {};
  return { optionsPath, options, composer: { path: composerPath, content } };
}

export function versionRequestFrom(sources: DeclarativeSources): VersionRequest {
  const request: VersionCandidate[] = [];
  if (sources.options.PHP_VERSION) {
    request.push({ source: "options-file", raw: sources.options.PHP_VERSION });
  }
  const composerConstraint = sources.composer?.content.require?.php;
  if (typeof composerConstraint === "string" && composerConstraint) {
    request.push({ source: "dependency-manifest-constraint", raw: composerConstraint });
  }
  return request;
}

export function composerRequireKeys(sources: DeclarativeSources): string[] {
  return Object.keys(sources.composer?.content.require ?? {});
}

export function loadStagerSettings(env: Environment = process.env): StagerSettings {
  return StagerEnvSchema.parse(collectEnv(STAGER_ENV_KEYS, env));
}
