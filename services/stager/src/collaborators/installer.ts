import { createHash } from "node:crypto";
import { copyFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Dependency, ManifestCatalog } from "../catalog/ManifestCatalog.js";
import { CatalogError } from "../errors.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import type { StagingReporter } from "../output.js";
import type { CommandRunner } from "./commandRunner.js";

export type FetchFn = typeof fetch;

/** Fetches and unpacks catalog dependencies. */
export interface DependencyInstaller {
  installDependency(dep: Dependency, outputDir: string): Promise<void>;
  installOnlyVersion(name: string, outputDir: string): Promise<Dependency>;
  fetchDependency(dep: Dependency, destFile: string): Promise<void>;
}

const ARCHIVE_PATTERN = /\.(tgz|tar\.gz)$/;

export class ManifestInstaller implements DependencyInstaller {
  private readonly logger: AppLogger;

  constructor(
    private readonly catalog: ManifestCatalog,
    private readonly cacheDir: string,
    private readonly commands: CommandRunner,
    private readonly reporter: StagingReporter,
    private readonly fetchImpl: FetchFn = fetch,
    logger: AppLogger = appLogger,
  ) {
    this.logger = logger.child({ component: "installer" });
  }

  async fetchDependency(dep: Dependency, destFile: string): Promise<void> {
    const entry = this.catalog.dependency(dep);
    const response = await this.fetchImpl(entry.uri);
    if (!response.ok) {
      throw new Error(`could not download ${dep.name} ${dep.version}: ${response.status} ${response.statusText}`);
    }
    const body = Buffer.from(await response.arrayBuffer());
    if (entry.sha256) {
      const actual = createHash("sha256").update(body).digest("hex");
      if (actual.toLowerCase() !== entry.sha256.toLowerCase()) {
        throw new CatalogError(`${dep.name} ${dep.version} checksum mismatch: expected ${entry.sha256}, got ${actual}`);
      }
    }
    await mkdir(path.dirname(destFile), { recursive: true });
    await writeFile(destFile, body);
    this.logger.debug({ dependency: dep, destFile }, "dependency downloaded");
  }

  async installDependency(dep: Dependency, outputDir: string): Promise<void> {
    this.reporter.beginStep(`Installing ${dep.name} ${dep.version}`);
    const entry = this.catalog.dependency(dep);
    const fileName = path.basename(new URL(entry.uri).pathname);
    const cached = path.join(this.cacheDir, "dependencies", `${dep.name}-${dep.version}`, fileName);
    await this.fetchDependency(dep, cached);

    await mkdir(outputDir, { recursive: true });
    if (ARCHIVE_PATTERN.test(fileName)) {
      await this.commands.run("tar", ["-xzf", cached, "-C", outputDir]);
    } else {
      await copyFile(cached, path.join(outputDir, fileName));
    }
    this.logger.info({ dependency: dep, outputDir }, "dependency installed");
  }

  async installOnlyVersion(name: string, outputDir: string): Promise<Dependency> {
    const dep = this.catalog.onlyVersion(name);
    await this.installDependency(dep, outputDir);
    return dep;
  }
}
