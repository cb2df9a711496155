import { createLogger, type AppLogger } from "@phpstage/stager";

export type CliLogger = AppLogger;

export const logger: CliLogger = createLogger({ bindings: { subsystem: "cli" } });
