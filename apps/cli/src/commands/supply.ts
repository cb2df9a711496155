import { stat } from "node:fs/promises";

import {
  ManifestCatalog,
  ManifestInstaller,
  SpawnCommandRunner,
  Stager,
  Supplier,
  consoleReporter,
  loadStagerSettings,
  type StagingDirs,
} from "@phpstage/stager";

import { logger } from "../logger.js";

async function requireDirectory(dir: string, label: string): Promise<void> {
  const info = await stat(dir).catch(() => undefined);
  if (!info?.isDirectory()) {
    throw new Error(`${label} ${dir} is not a directory`);
  }
}

export async function runSupply(dirs: StagingDirs, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  await requireDirectory(dirs.buildDir, "build dir");
  const settings = loadStagerSettings(env);
  const stager = new Stager(dirs);
  const catalog = await ManifestCatalog.load(settings.buildpackDir, settings.stack);
  const commands = new SpawnCommandRunner();
  const installer = new ManifestInstaller(catalog, stager.cacheDir, commands, consoleReporter, fetch, logger);

  logger.info({ buildDir: stager.buildDir, depDir: stager.depDir }, "supply started");
  await new Supplier({ stager, catalog, installer, commands, settings, logger }).run();
  logger.info({ depDir: stager.depDir }, "supply finished");
}
