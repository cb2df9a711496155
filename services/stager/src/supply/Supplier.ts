import { access, chmod, copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import {
  DEFAULT_PHP_EXTENSIONS,
  aggregateExtensions,
  buildBindingContexts,
  loadTemplateTree,
  renderTemplateTree,
  resolveFromCatalog,
  sortedExtensionNames,
  toError,
  versionLine,
  type ExtensionSet,
  type RenderedFile,
  type ResolvedVersion,
  type TemplateLayer,
} from "@phpstage/synth";

import type { ManifestCatalog } from "../catalog/ManifestCatalog.js";
import type { CommandRunner } from "../collaborators/commandRunner.js";
import type { DependencyInstaller } from "../collaborators/installer.js";
import { isComposerTokenValid } from "../collaborators/tokenValidator.js";
import {
  composerRequireKeys,
  loadDeclarativeSources,
  versionRequestFrom,
  type DeclarativeSources,
} from "../config/loadConfig.js";
import type { StagerSettings } from "../config/schema.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import { consoleReporter, type StagingReporter } from "../output.js";
import { runPipeline, type PipelineStep } from "../pipeline/pipeline.js";
import {
  PROFILE_SCRIPT_NAME,
  START_SCRIPT_NAME,
  VERIFIER_NAME,
  renderProfileScript,
  renderStartScript,
  rewriteApachectl,
} from "../scripts/startScripts.js";
import type { Stager } from "../stager/Stager.js";

export const BUILD_CONFIG_DIR = ".bp-config";
export const DEFAULT_TEMPLATES_DIR = path.join("defaults", "config");

export interface SupplierDeps {
  stager: Stager;
  catalog: ManifestCatalog;
  installer: DependencyInstaller;
  commands: CommandRunner;
  settings: StagerSettings;
  reporter?: StagingReporter;
  logger?: AppLogger;
  validateToken?: (token: string) => Promise<boolean>;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new Error(`${what} is not available yet`);
  }
  return value;
}

/** Stages PHP and httpd into the dep dir and synthesizes their configuration. */
export class Supplier {
  private readonly stager: Stager;
  private readonly catalog: ManifestCatalog;
  private readonly installer: DependencyInstaller;
  private readonly commands: CommandRunner;
  private readonly settings: StagerSettings;
  private readonly reporter: StagingReporter;
  private readonly logger: AppLogger;
  private readonly validateToken: (token: string) => Promise<boolean>;

  private sources?: DeclarativeSources;
  private php?: ResolvedVersion;
  private extensions?: ExtensionSet;
  private rendered: RenderedFile[] = [];

  constructor(deps: SupplierDeps) {
    this.stager = deps.stager;
    this.catalog = deps.catalog;
    this.installer = deps.installer;
    this.commands = deps.commands;
    this.settings = deps.settings;
    this.reporter = deps.reporter ?? consoleReporter;
    this.logger = (deps.logger ?? appLogger).child({ pipeline: "supply" });
    this.validateToken =
      deps.validateToken ??
      ((token) =>
        isComposerTokenValid(token, {
          url: deps.settings.tokenCheckUrl,
          timeoutMs: deps.settings.tokenCheckTimeoutMs,
          logger: this.logger,
        }));
  }

  get phpVersion(): ResolvedVersion | undefined {
    return this.php;
  }

  get extensionSet(): ExtensionSet | undefined {
    return this.extensions;
  }

  get renderedFiles(): readonly RenderedFile[] {
    return this.rendered;
  }

  async run(): Promise<void> {
    this.reporter.beginStep("Supplying php");
    try {
      await runPipeline(this.steps(), this.logger);
    } catch (error) {
      this.reporter.error(toError(error).message);
      throw error;
    }
  }

  private steps(): PipelineStep[] {
    const hasComposer = () => this.sources?.composer !== undefined;
    return [
      { name: "reading config", run: () => this.readConfig() },
      { name: "Initializing: php version", run: () => this.setupPhpVersion() },
      { name: "Initializing: extensions", run: () => this.setupExtensions() },
      { name: "Installing HTTPD", run: () => this.installHttpd() },
      { name: "Installing PHP", run: () => this.installPhp() },
      { name: "Writing config files", run: () => this.writeConfigFiles() },
      { name: "Installing composer", when: hasComposer, run: () => this.installComposer() },
      { name: "Running composer", when: hasComposer, run: () => this.runComposer() },
      { name: "Installing verifier", run: () => this.installVerifier() },
      { name: "Writing profile.d script", run: () => this.writeProfileD() },
      { name: "Writing start script", run: () => this.writeStartFile() },
    ];
  }

  async readConfig(): Promise<void> {
    this.sources = await loadDeclarativeSources(this.stager.buildDir, this.settings);
    this.logger.debug(
      { options: this.sources.options, composer: this.sources.composer?.path },
      "declarative sources loaded",
    );
  }

  async setupPhpVersion(): Promise<void> {
    const sources = required(this.sources, "app configuration");
    const { resolved, warnings } = resolveFromCatalog(versionRequestFrom(sources), this.catalog, "php");
    for (const warning of warnings) {
      this.reporter.warning(warning);
    }
    this.logger.debug({ php: resolved }, "php version resolved");
    this.php = resolved;
  }

  async setupExtensions(): Promise<void> {
    const sources = required(this.sources, "app configuration");
    const { extensions, warnings } = aggregateExtensions(
      DEFAULT_PHP_EXTENSIONS,
      { php: sources.options.PHP_EXTENSIONS, zend: sources.options.ZEND_EXTENSIONS },
      composerRequireKeys(sources),
    );
    for (const warning of warnings) {
      this.reporter.warning(warning);
    }
    this.logger.debug(
      { php: sortedExtensionNames(extensions.php), zend: sortedExtensionNames(extensions.zend) },
      "extensions aggregated",
    );
    this.extensions = extensions;
  }

  async installHttpd(): Promise<void> {
    const depDir = this.stager.depDir;
    await this.installer.installOnlyVersion("httpd", depDir);
    for (const dir of ["bin", "lib"]) {
      await this.stager.linkDirectoryInDepDir(path.join(depDir, "httpd", dir), dir);
    }
    const apachectl = path.join(depDir, "httpd", "bin", "apachectl");
    this.logger.debug({ depsIdx: this.stager.depsIdx }, "rewriting apachectl paths");
    const script = await readFile(apachectl, "utf8");
    await writeFile(apachectl, rewriteApachectl(script, this.stager.depsIdx), "utf8");
    await chmod(apachectl, 0o755);
  }

  async installPhp(): Promise<void> {
    const php = required(this.php, "php version");
    const depDir = this.stager.depDir;
    await this.installer.installDependency({ name: "php", version: php.version }, depDir);
    for (const dir of ["bin", "lib"]) {
      await this.stager.linkDirectoryInDepDir(path.join(depDir, "php", dir), dir);
    }
  }

  templateLayers(phpVersion: string): TemplateLayer[] {
    const defaults = path.join(this.settings.buildpackDir, DEFAULT_TEMPLATES_DIR);
    const overrides = path.join(this.stager.buildDir, BUILD_CONFIG_DIR);
    return [
      { sourceDir: path.join(defaults, "php", versionLine(phpVersion)), destPrefix: "php/etc" },
      { sourceDir: path.join(defaults, "httpd"), destPrefix: "httpd/conf" },
      { sourceDir: path.join(overrides, "php"), destPrefix: "php/etc", optional: true },
      { sourceDir: path.join(overrides, "httpd"), destPrefix: "httpd/conf", optional: true },
    ];
  }

  async writeConfigFiles(): Promise<void> {
    this.reporter.beginStep("Write config files");
    const php = required(this.php, "php version");
    const extensions = required(this.extensions, "extension set");
    const options = required(this.sources, "app configuration").options;

    const contexts = buildBindingContexts(
      {
        phpVersion: php.version,
        extensions,
        webdir: options.WEBDIR ?? "",
        libdir: options.LIBDIR,
        depsIdx: this.stager.depsIdx,
      },
      {
        home: this.stager.buildDir,
        depsDir: this.stager.depsDir,
        tmpDir: this.settings.stageTmpDir,
        composerCacheDir: path.join(this.stager.cacheDir, "composer"),
      },
    );
    this.logger.debug({ versionLine: versionLine(php.version) }, "php version line");

    const tree = await loadTemplateTree(this.templateLayers(php.version));
    this.rendered = await renderTemplateTree(tree, contexts, {
      stage: this.settings.stageConfigDir,
      run: this.stager.depDir,
    });
    this.logger.debug({ files: tree.size }, "config files written");
  }

  private composerBinary(): string {
    return path.join(this.stager.depDir, "bin", "composer");
  }

  async installComposer(): Promise<void> {
    const dep = this.catalog.onlyVersion("composer");
    this.reporter.beginStep(`Installing composer ${dep.version}`);
    await this.installer.fetchDependency(dep, this.composerBinary());
  }

  composerEnv(): NodeJS.ProcessEnv {
    const composer = required(this.sources, "app configuration").composer;
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      COMPOSER_NO_INTERACTION: "1",
      COMPOSER_CACHE_DIR: path.join(this.stager.cacheDir, "composer"),
      COMPOSER_VENDOR_DIR: path.join(this.stager.buildDir, "vendor"),
      COMPOSER_BIN_DIR: path.join(this.stager.depDir, "php", "bin"),
      PHPRC: path.join(this.settings.stageConfigDir, "php", "etc"),
      TMPDIR: this.settings.stageTmpDir,
    };
    if (composer) {
      env.COMPOSER = composer.path;
    }
    return env;
  }

  async runComposer(): Promise<void> {
    this.reporter.beginStep("Running composer");
    const env = this.composerEnv();
    const cwd = this.stager.buildDir;
    const token = this.settings.composerGithubToken;

    if (token) {
      if (await this.validateToken(token)) {
        this.reporter.beginStep("Using custom GitHub OAuth token in $COMPOSER_GITHUB_OAUTH_TOKEN");
        await this.commands.run("php", [this.composerBinary(), "config", "-g", "github-oauth.github.com", token], {
          cwd,
          env,
        });
      } else {
        this.reporter.beginStep("The GitHub OAuth token supplied from $COMPOSER_GITHUB_OAUTH_TOKEN is invalid");
      }
    }

    await this.commands.run("php", [this.composerBinary(), "install", "--no-progress", "--no-dev"], {
      cwd,
      env,
      relayOutput: true,
    });
  }

  async installVerifier(): Promise<void> {
    const dest = path.join(this.stager.depDir, "bin", VERIFIER_NAME);
    if (await pathExists(dest)) {
      this.logger.debug({ dest }, "verifier already present");
      return;
    }
    await mkdir(path.dirname(dest), { recursive: true });
    await copyFile(path.join(this.settings.buildpackDir, "bin", VERIFIER_NAME), dest);
    await chmod(dest, 0o755);
  }

  async writeProfileD(): Promise<void> {
    this.reporter.beginStep("Writing profile.d script");
    const iniScanDir = await pathExists(path.join(this.stager.depDir, "php", "etc", "php.ini.d"));
    await this.stager.writeProfileD(PROFILE_SCRIPT_NAME, renderProfileScript(this.stager.depsIdx, { iniScanDir }));
  }

  async writeStartFile(): Promise<void> {
    this.reporter.beginStep(`Writing start script (${START_SCRIPT_NAME})`);
    const file = path.join(this.stager.depDir, "bin", START_SCRIPT_NAME);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, renderStartScript(this.stager.depsIdx, { verify: false }), "utf8");
    await chmod(file, 0o755);
  }
}
