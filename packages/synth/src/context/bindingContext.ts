import { sortedExtensionNames, type ExtensionSet } from "../extensions/extensionAggregator.js";

export const BINDING_KEYS = [
  "PhpVersion",
  "DepsIdx",
  "PhpFpmConfInclude",
  "PhpFpmListen",
  "Webdir",
  "Libdir",
  "HOME",
  "DEPS_DIR",
  "TMPDIR",
  "ComposerCacheDir",
  "PhpExtensions",
  "ZendExtensions",
] as const;

export type BindingKey = (typeof BINDING_KEYS)[number];

export type BindingContext = Readonly<Record<BindingKey, string>>;

export type ContextName = "stage" | "run";

/**
 * Keys whose values may differ between the stage and run contexts. Everything
 * else must be bound identically.
 */
export const VARYING_BINDING_KEYS: readonly BindingKey[] = [
  "HOME",
  "DEPS_DIR",
  "TMPDIR",
  "ComposerCacheDir",
  "PhpExtensions",
];

/** The running server needs TLS even when staging got by without it. */
export const RUNTIME_REQUIRED_EXTENSION = "openssl";

export const DEFAULT_PHP_FPM_LISTEN = "127.0.0.1:9000";
export const DEFAULT_LIBDIR = "lib";

export interface ContextPaths {
  home: string;
  depsDir: string;
  tmpDir: string;
  composerCacheDir: string;
}

export interface BindingInputs {
  phpVersion: string;
  extensions: ExtensionSet;
  webdir: string;
  libdir?: string;
  depsIdx: string;
  phpFpmListen?: string;
}

export interface BindingContexts {
  stage: BindingContext;
  run: BindingContext;
}

/** Paths the running container resolves from its own environment. */
export function runtimeContextPaths(): ContextPaths {
  return {
    home: "${HOME}",
    depsDir: "${DEPS_DIR}",
    tmpDir: "${TMPDIR}",
    composerCacheDir: "${HOME}/.composer/cache",
  };
}

export function serializePhpExtensions(names: ReadonlySet<string>): string {
  return sortedExtensionNames(names)
    .map((name) => `extension=${name}.so\n`)
    .join("");
}

export function serializeZendExtensions(names: ReadonlySet<string>): string {
  return sortedExtensionNames(names)
    .map((name) => `zend_extension=${name}\n`)
    .join("");
}

function bindContext(inputs: BindingInputs, paths: ContextPaths, phpExtensions: ReadonlySet<string>): BindingContext {
  return {
    PhpVersion: inputs.phpVersion,
    DepsIdx: inputs.depsIdx,
    PhpFpmConfInclude: "",
    PhpFpmListen: inputs.phpFpmListen ?? DEFAULT_PHP_FPM_LISTEN,
    Webdir: inputs.webdir,
    Libdir: inputs.libdir ?? DEFAULT_LIBDIR,
    HOME: paths.home,
    DEPS_DIR: paths.depsDir,
    TMPDIR: paths.tmpDir,
    ComposerCacheDir: paths.composerCacheDir,
    PhpExtensions: serializePhpExtensions(phpExtensions),
    ZendExtensions: serializeZendExtensions(inputs.extensions.zend),
  };
}

export function buildBindingContexts(
  inputs: BindingInputs,
  stagingPaths: ContextPaths,
  runtimePaths: ContextPaths = runtimeContextPaths(),
): BindingContexts {
  const runExtensions = new Set(inputs.extensions.php);
  runExtensions.add(RUNTIME_REQUIRED_EXTENSION);
  return {
    stage: bindContext(inputs, stagingPaths, inputs.extensions.php),
    run: bindContext(inputs, runtimePaths, runExtensions),
  };
}

export function diffBindingContexts(left: BindingContext, right: BindingContext): BindingKey[] {
  return BINDING_KEYS.filter((key) => left[key] !== right[key]);
}
