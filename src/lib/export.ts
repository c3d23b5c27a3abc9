import { writeFileSync } from "fs";
import { join } from "path";
import { ensureDir } from "../utils/paths.js";
import { ExportError, errorMessage } from "./errors.js";

export interface ExportOptions {
  dir: string;
  filename?: string;
  now?: () => Date;
}

export function defaultExportFilename(date: Date): string {
  return `catalog_copy_${Math.floor(date.getTime() / 1000)}.txt`;
}

/** Writes `text` as UTF-8 and returns the file path. */
export function exportContent(text: string, options: ExportOptions): string {
  const now = options.now ?? (() => new Date());
  const filename = options.filename ?? defaultExportFilename(now());
  const path = join(options.dir, filename);

  try {
    ensureDir(options.dir);
    writeFileSync(path, text, "utf-8");
  } catch (error) {
    throw new ExportError(`Could not write ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return path;
}
