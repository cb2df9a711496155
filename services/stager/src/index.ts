export { ManifestCatalog, MANIFEST_FILE } from "./catalog/ManifestCatalog.js";
export type { Dependency } from "./catalog/ManifestCatalog.js";
export { SpawnCommandRunner } from "./collaborators/commandRunner.js";
export type { CommandOptions, CommandRunner } from "./collaborators/commandRunner.js";
export { ManifestInstaller } from "./collaborators/installer.js";
export type { DependencyInstaller, FetchFn } from "./collaborators/installer.js";
export { isComposerTokenValid } from "./collaborators/tokenValidator.js";
export {
  COMPOSER_FILE,
  OPTIONS_FILE,
  composerRequireKeys,
  loadDeclarativeSources,
  loadStagerSettings,
  versionRequestFrom,
} from "./config/loadConfig.js";
export type { ComposerSource, DeclarativeSources } from "./config/loadConfig.js";
export { PACKAGE_ROOT } from "./config/schema.js";
export type { StagerSettings } from "./config/schema.js";
export { CatalogError, CommandError, ConfigSourceError, StageError } from "./errors.js";
export { Finalizer } from "./finalize/Finalizer.js";
export type { FinalizerDeps } from "./finalize/Finalizer.js";
export { appLogger, createLogger, normalizeError } from "./observability/logger.js";
export type { AppLogger } from "./observability/logger.js";
export { consoleReporter, printErrorLine, printLine } from "./output.js";
export type { StagingReporter } from "./output.js";
export { runPipeline } from "./pipeline/pipeline.js";
export type { PipelineStep } from "./pipeline/pipeline.js";
export { Stager } from "./stager/Stager.js";
export type { StagingDirs } from "./stager/Stager.js";
export { Supplier } from "./supply/Supplier.js";
export type { SupplierDeps } from "./supply/Supplier.js";
