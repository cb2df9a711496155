import { readFile } from "node:fs/promises";
import path from "node:path";

import type { VersionCatalog } from "@phpstage/synth";
import YAML from "yaml";

import { ManifestSchema, type Manifest, type ManifestDependency } from "../config/schema.js";
import { CatalogError } from "../errors.js";

export const MANIFEST_FILE = "manifest.yml";

export interface Dependency {
  name: string;
  version: string;
}

/**
 * The buildpack manifest: available dependency versions and their defaults. With a
 * `stack`, entries whose `cf_stacks` list other stacks are invisible; an entry with
 * no `cf_stacks` serves every stack.
 */
export class ManifestCatalog implements VersionCatalog {
  constructor(
    private readonly manifest: Manifest,
    readonly rootDir: string,
    readonly stack?: string,
  ) {}

  static fromYaml(text: string, rootDir: string, stack?: string): ManifestCatalog {
    let document: unknown;
    try {
      document = YAML.parse(text);
    } catch (error) {
      throw new CatalogError(`${MANIFEST_FILE} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
    }
    const result = ManifestSchema.safeParse(document ?? {});
    if (!result.success) {
      const detail = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new CatalogError(`${MANIFEST_FILE} is invalid: ${detail}`);
    }
    return new ManifestCatalog(result.data, rootDir, stack);
  }

  static async load(rootDir: string, stack?: string): Promise<ManifestCatalog> {
    const file = path.join(rootDir, MANIFEST_FILE);
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      throw new CatalogError(`cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return ManifestCatalog.fromYaml(text, rootDir, stack);
  }

  private entries(name: string): ManifestDependency[] {
    const { stack } = this;
    return this.manifest.dependencies.filter(
      (dep) => dep.name === name && (!stack || dep.cf_stacks.length === 0 || dep.cf_stacks.includes(stack)),
    );
  }

  allVersions(name: string): string[] {
    return this.entries(name).map((dep) => dep.version);
  }

  defaultVersion(name: string): string {
    const entries = this.manifest.default_versions.filter((entry) => entry.name === name);
    if (entries.length !== 1) {
      throw new CatalogError(`found ${entries.length} default versions for ${name}`);
    }
    const { version } = entries[0];
    if (!this.allVersions(name).includes(version)) {
      throw new CatalogError(`default version ${version} of ${name} is not in the manifest dependencies`);
    }
    return version;
  }

  onlyVersion(name: string): Dependency {
    const versions = this.allVersions(name);
    if (versions.length !== 1) {
      throw new CatalogError(`expected 1 version of ${name}, found ${versions.length}`);
    }
    return { name, version: versions[0] };
  }

  dependency(dep: Dependency): ManifestDependency {
    const entry = this.entries(dep.name).find((item) => item.version === dep.version);
    if (!entry) {
      const where = this.stack ? `${MANIFEST_FILE} for stack ${this.stack}` : MANIFEST_FILE;
      throw new CatalogError(`dependency ${dep.name} ${dep.version} not found in ${where}`);
    }
    return entry;
  }
}
