import { Command } from "commander";
import { registerBatchCommand } from "./commands/batch.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerProductsCommand } from "./commands/products.js";
import { VERSION } from "../version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("catalog-copy")
    .description("Generate e-commerce product copy from a catalog, with template fallback and savings analytics")
    .version(VERSION);

  registerGenerateCommand(program);
  registerBatchCommand(program);
  registerProductsCommand(program);
  registerConfigCommand(program);

  return program;
}
