import { Transform, type TransformCallback } from "node:stream";

export const STEP_PREFIX = "-----> ";
export const DETAIL_INDENT = "       ";

function writeLine(stream: NodeJS.WritableStream, parts: readonly string[]): void {
  stream.write(`${parts.filter((part) => part.length > 0).join(" ")}\n`);
}

export function printLine(...parts: string[]): void {
  writeLine(process.stdout, parts);
}

export function printErrorLine(...parts: string[]): void {
  writeLine(process.stderr, parts);
}

/** The human-readable staging transcript. */
export interface StagingReporter {
  beginStep(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export const consoleReporter: StagingReporter = {
  beginStep(message) {
    printLine(`${STEP_PREFIX}${message}`);
  },
  warning(message) {
    printLine(`${DETAIL_INDENT}**WARNING** ${message}`);
  },
  error(message) {
    printErrorLine(`${DETAIL_INDENT}**ERROR** ${message}`);
  },
};

/** Prefixes every line passing through with `prefix`. */
export function createIndentStream(prefix: string = DETAIL_INDENT): Transform {
  let atLineStart = true;
  return new Transform({
    transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback) {
      const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      let indented = "";
      for (const char of text) {
        if (atLineStart) {
          indented += prefix;
          atLineStart = false;
        }
        indented += char;
        if (char === "\n") {
          atLineStart = true;
        }
      }
      callback(null, indented);
    },
  });
}
