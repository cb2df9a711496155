import { chmod, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { toError } from "@phpstage/synth";

import { appLogger, type AppLogger } from "../observability/logger.js";
import { consoleReporter, type StagingReporter } from "../output.js";
import { runPipeline } from "../pipeline/pipeline.js";
import { START_SCRIPT_NAME, renderReleaseDescriptor, renderStartScript } from "../scripts/startScripts.js";
import type { Stager } from "../stager/Stager.js";

export interface FinalizerDeps {
  stager: Stager;
  releaseFile: string;
  reporter?: StagingReporter;
  logger?: AppLogger;
}

/** Writes the verifying start script and the release descriptor the platform reads. */
export class Finalizer {
  private readonly reporter: StagingReporter;
  private readonly logger: AppLogger;

  constructor(private readonly deps: FinalizerDeps) {
    this.reporter = deps.reporter ?? consoleReporter;
    this.logger = (deps.logger ?? appLogger).child({ pipeline: "finalize" });
  }

  async run(): Promise<void> {
    this.reporter.beginStep("Finalizing php");
    try {
      await runPipeline(
        [
          { name: "Writing start script", run: () => this.writeStartFile() },
          { name: "Writing release yml", run: () => this.writeReleaseYml() },
        ],
        this.logger,
      );
    } catch (error) {
      this.reporter.error(toError(error).message);
      throw error;
    }
  }

  async writeStartFile(): Promise<void> {
    const { stager } = this.deps;
    const file = path.join(stager.depDir, "bin", START_SCRIPT_NAME);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, renderStartScript(stager.depsIdx, { verify: true }), "utf8");
    await chmod(file, 0o755);
  }

  async writeReleaseYml(): Promise<void> {
    const { releaseFile, stager } = this.deps;
    await mkdir(path.dirname(releaseFile), { recursive: true });
    await writeFile(releaseFile, renderReleaseDescriptor(stager.depsIdx), "utf8");
    this.logger.debug({ releaseFile }, "release descriptor written");
  }
}
