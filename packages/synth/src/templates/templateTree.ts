import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import type { BindingContexts, ContextName } from "../context/bindingContext.js";
import { renderDual } from "./renderer.js";

export interface TemplateLayer {
  /** Directory the templates are read from. */
  sourceDir: string;
  /** Output prefix the layer's files are written under, e.g. `php/etc`. */
  destPrefix: string;
  /** Missing optional layers are skipped; missing required layers fail the walk. */
  optional?: boolean;
}

export interface TemplateEntry {
  relativePath: string;
  sourcePath: string;
  content: string;
}

/** Entries keyed and ordered by output-relative path. */
export type TemplateTree = ReadonlyMap<string, TemplateEntry>;

export interface RenderDestinations {
  stage: string;
  run: string;
}

export interface RenderedFile {
  relativePath: string;
  context: ContextName;
  destination: string;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

async function listFiles(root: string, relative = ""): Promise<string[]> {
  const entries = await readdir(path.join(root, relative), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of [...entries].sort((left, right) => (left.name < right.name ? -1 : 1))) {
    const entryPath = path.join(relative, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    } else if (entry.isSymbolicLink()) {
      // Links are followed to their target.
      const target = await stat(path.join(root, entryPath));
      if (target.isDirectory()) {
        files.push(...(await listFiles(root, entryPath)));
      } else if (target.isFile()) {
        files.push(entryPath);
      }
    }
  }
  return files;
}

async function readLayer(layer: TemplateLayer): Promise<TemplateEntry[]> {
  let files: string[];
  try {
    files = await listFiles(layer.sourceDir);
  } catch (error) {
    if (layer.optional && isNotFound(error)) {
      return [];
    }
    throw error;
  }
  return Promise.all(
    files.map(async (file) => {
      const sourcePath = path.join(layer.sourceDir, file);
      return {
        relativePath: path.posix.join(layer.destPrefix, file.split(path.sep).join("/")),
        sourcePath,
        content: await readFile(sourcePath, "utf8"),
      };
    }),
  );
}

/**
 * Reads the layers in order. A later layer replaces an earlier one file by file
 * wherever both define the same output path.
 */
export async function loadTemplateTree(layers: readonly TemplateLayer[]): Promise<TemplateTree> {
  const tree = new Map<string, TemplateEntry>();
  for (const layer of layers) {
    for (const entry of await readLayer(layer)) {
      tree.set(entry.relativePath, entry);
    }
  }
  return new Map([...tree.entries()].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0)));
}

/**
 * Renders every template for both contexts before the first write, so a template
 * error leaves both destination trees untouched.
 */
export async function renderTemplateTree(
  tree: TemplateTree,
  contexts: BindingContexts,
  destinations: RenderDestinations,
): Promise<RenderedFile[]> {
  const rendered = [...tree.values()].map((entry) => ({
    entry,
    output: renderDual(entry.content, entry.relativePath, contexts),
  }));

  const written: RenderedFile[] = [];
  for (const { entry, output } of rendered) {
    for (const context of ["stage", "run"] as const) {
      const destination = path.join(destinations[context], entry.relativePath);
      await mkdir(path.dirname(destination), { recursive: true });
      await writeFile(destination, output[context], "utf8");
      written.push({ relativePath: entry.relativePath, context, destination });
    }
  }
  return written;
}
