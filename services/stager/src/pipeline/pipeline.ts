import { toError } from "@phpstage/synth";

import { StageError } from "../errors.js";
import { appLogger, normalizeError, type AppLogger } from "../observability/logger.js";

export interface PipelineStep {
  /** Phase label carried by any error this step raises. */
  name: string;
  /** Steps whose guard returns false are skipped. */
  when?: () => boolean;
  run: () => Promise<void>;
}

/**
 * Runs the steps in order and stops at the first failure, which is rethrown as a
 * {@link StageError} naming the step. Steps are never retried.
 */
export async function runPipeline(steps: readonly PipelineStep[], logger: AppLogger = appLogger): Promise<void> {
  for (const step of steps) {
    if (step.when && !step.when()) {
      logger.debug({ step: step.name }, "step skipped");
      continue;
    }
    const startedAt = Date.now();
    try {
      await step.run();
    } catch (error) {
      const failure = new StageError(step.name, toError(error));
      logger.error({ step: step.name, err: normalizeError(failure) }, "step failed");
      throw failure;
    }
    logger.debug({ step: step.name, durationMs: Date.now() - startedAt }, "step completed");
  }
}
