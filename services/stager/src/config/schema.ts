/**
 * Schemas for everything the stager reads: the app's declarative sources, the
 * buildpack manifest and the process environment.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

// ============================================================================
// App sources
// ============================================================================

/** `.bp-config/options.json`. Unknown keys are dropped. */
export const OptionsFileSchema = z.object({
  PHP_VERSION: z.string().optional(),
  PHP_EXTENSIONS: z.array(z.string()).optional(),
  ZEND_EXTENSIONS: z.array(z.string()).optional(),
  WEBDIR: z.string().optional(),
  LIBDIR: z.string().optional(),
});
export type OptionsFile = z.infer<typeof OptionsFileSchema>;

/**
 * A `require` that is not a map counts as absent. PHP encodes an empty map as `[]`,
 * so that shape is common in real files.
 */
const RequireMapSchema = z.union([
  z.record(z.string(), z.unknown()),
  z.unknown().transform(() => undefined),
]);

/** `composer.json`; only `require` matters here. */
export const ComposerFileSchema = z.object({
  require: RequireMapSchema.optional(),
});
export type ComposerFile = z.infer<typeof ComposerFileSchema>;

// ============================================================================
// Buildpack manifest
// ============================================================================

export const ManifestDependencySchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  uri: z.string().min(1),
  sha256: z.string().regex(/^[a-f0-9]{64}$/i).optional(),
  cf_stacks: z.array(z.string()).default([]),
});
export type ManifestDependency = z.infer<typeof ManifestDependencySchema>;

export const ManifestSchema = z.object({
  default_versions: z
    .array(z.object({ name: z.string().min(1), version: z.string().min(1) }))
    .default([]),
  dependencies: z.array(ManifestDependencySchema).default([]),
});
export type Manifest = z.infer<typeof ManifestSchema>;

// ============================================================================
// Environment
// ============================================================================

/** The stager package root, which doubles as the buildpack root by default. */
export const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const StagerEnvSchema = z
  .object({
    CF_STACK: z.string().optional(),
    COMPOSER_PATH: z.string().optional(),
    COMPOSER_GITHUB_OAUTH_TOKEN: z.string().optional(),
    PHPSTAGE_STAGE_CONFIG_DIR: z.string().default("/tmp/php_etc"),
    PHPSTAGE_STAGE_TMPDIR: z.string().default("/tmp"),
    PHPSTAGE_RELEASE_FILE: z.string().default("/tmp/php-buildpack-release-step.yml"),
    PHPSTAGE_BUILDPACK_DIR: z.string().default(PACKAGE_ROOT),
    PHPSTAGE_TOKEN_CHECK_URL: z.string().url().default("https://api.github.com/rate_limit"),
    PHPSTAGE_TOKEN_CHECK_TIMEOUT_MS: z.coerce.number().int().min(100).max(120000).default(10000),
  })
  .transform((env) => ({
    stack: env.CF_STACK,
    composerPath: env.COMPOSER_PATH,
    composerGithubToken: env.COMPOSER_GITHUB_OAUTH_TOKEN,
    stageConfigDir: env.PHPSTAGE_STAGE_CONFIG_DIR,
    stageTmpDir: env.PHPSTAGE_STAGE_TMPDIR,
    releaseFile: env.PHPSTAGE_RELEASE_FILE,
    buildpackDir: env.PHPSTAGE_BUILDPACK_DIR,
    tokenCheckUrl: env.PHPSTAGE_TOKEN_CHECK_URL,
    tokenCheckTimeoutMs: env.PHPSTAGE_TOKEN_CHECK_TIMEOUT_MS,
  }));
export type StagerSettings = z.output<typeof StagerEnvSchema>;

export const STAGER_ENV_KEYS = [
  "CF_STACK",
  "COMPOSER_PATH",
  "COMPOSER_GITHUB_OAUTH_TOKEN",
  "PHPSTAGE_STAGE_CONFIG_DIR",
  "PHPSTAGE_STAGE_TMPDIR",
  "PHPSTAGE_RELEASE_FILE",
  "PHPSTAGE_BUILDPACK_DIR",
  "PHPSTAGE_TOKEN_CHECK_URL",
  "PHPSTAGE_TOKEN_CHECK_TIMEOUT_MS",
] as const;
