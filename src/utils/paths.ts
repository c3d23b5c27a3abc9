import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";

export function getConfigPath(): string {
  return process.env.CATALOG_COPY_CONFIG || join(homedir(), ".config", "catalog-copy", "config.json");
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
