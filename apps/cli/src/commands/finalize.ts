import { Finalizer, Stager, loadStagerSettings, type StagingDirs } from "@phpstage/stager";

import { logger } from "../logger.js";

export async function runFinalize(dirs: StagingDirs, env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const settings = loadStagerSettings(env);
  const stager = new Stager(dirs);
  await new Finalizer({ stager, releaseFile: settings.releaseFile, logger }).run();
  logger.info({ releaseFile: settings.releaseFile }, "finalize finished");
}
