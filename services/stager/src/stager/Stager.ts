import { mkdir, readdir, symlink, writeFile } from "node:fs/promises";
import path from "node:path";

export interface StagingDirs {
  buildDir: string;
  cacheDir: string;
  depsDir: string;
  depsIdx: string;
}

const DEPS_IDX_PATTERN = /^\d+$/;

/** The directories the platform hands a buildpack, and the writes it may make there. */
export class Stager {
  readonly buildDir: string;
  readonly cacheDir: string;
  readonly depsDir: string;
  readonly depsIdx: string;

  constructor(dirs: StagingDirs) {
    if (!DEPS_IDX_PATTERN.test(dirs.depsIdx)) {
      throw new Error(`deps index must be a non-negative integer, got "${dirs.depsIdx}"`);
    }
    this.buildDir = path.resolve(dirs.buildDir);
    this.cacheDir = path.resolve(dirs.cacheDir);
    this.depsDir = path.resolve(dirs.depsDir);
    this.depsIdx = dirs.depsIdx;
  }

  get depDir(): string {
    return path.join(this.depsDir, this.depsIdx);
  }

  /** Symlinks every entry of `sourceDir` into `<depDir>/<destSubdir>`. */
  async linkDirectoryInDepDir(sourceDir: string, destSubdir: string): Promise<void> {
    const destDir = path.join(this.depDir, destSubdir);
    await mkdir(destDir, { recursive: true });
    for (const entry of await readdir(sourceDir)) {
      const target = path.relative(destDir, path.join(sourceDir, entry));
      await symlink(target, path.join(destDir, entry));
    }
  }

  async writeProfileD(scriptName: string, script: string): Promise<string> {
    const profileDir = path.join(this.depDir, "profile.d");
    await mkdir(profileDir, { recursive: true });
    const file = path.join(profileDir, scriptName);
    await writeFile(file, script, { encoding: "utf8", mode: 0o755 });
    return file;
  }
}
