import { Command } from "commander";
import chalk from "chalk";
import { basename, dirname, resolve } from "path";
import { calculateKpis, calculateRoi } from "../../lib/analytics.js";
import { loadConfig } from "../../lib/config.js";
import { exportContent } from "../../lib/export.js";
import {
  buildPrompt,
  getContentTypeLabel,
  listContentTypes,
  listLanguages,
  listTones,
} from "../../lib/prompts.js";
import type { Generation } from "../../lib/pipeline.js";
import { logger } from "../../utils/logger.js";
import {
  type RuntimeOptions,
  buildRequest,
  createContext,
  fail,
  loadProducts,
  requireProduct,
} from "../shared.js";

interface GenerateCommandOptions extends RuntimeOptions {
  promptOnly?: boolean;
  output?: string | boolean;
}

/** Resolves `-o` (reports dir, default name) or `-o <file>` to export options. */
export function resolveExportTarget(
  output: string | true,
  reportsDir: string
): { dir: string; filename?: string } {
  if (output === true) {
    return { dir: resolve(reportsDir) };
  }
  const path = resolve(output);
  return { dir: dirname(path), filename: basename(path) };
}

function printGeneration({ result, snapshot, recommendation }: Generation): void {
  const { request } = result;
  logger.header(getContentTypeLabel(request.contentType));
  logger.label("Product", `${request.product.name} (${request.product.id})`);
  logger.label("Tone", request.tone);
  logger.label("Language", request.language);
  logger.label(
    "Source",
    result.source === "remote" ? chalk.green(`remote (${result.model})`) : chalk.yellow("fallback template")
  );
  logger.label("Attempts", result.attempts);
  logger.label("Duration", `${result.durationMs}ms`);
  logger.divider();
  console.log();
  console.log(result.text);
  console.log();
  logger.divider();

  if (result.source === "fallback") {
    logger.warning(`Used a fallback template: ${result.errorNote}`);
  }
  logger.info(recommendation);

  const kpis = calculateKpis(snapshot);
  logger.label("Time saved", `${kpis.timeSavedHours}h`);
  logger.label("Cost saved", `${kpis.costSaved}`);
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate <productId>")
    .description("Generate copy for one catalog product")
    .option("-t, --type <type>", `Content type (${listContentTypes().join(", ")})`)
    .option("--tone <tone>", `Tone (${listTones().join(", ")})`)
    .option("-l, --language <language>", `Language (${listLanguages().join(", ")})`)
    .option("-c, --catalog <path>", "Catalog CSV file")
    .option("--max-retries <count>", "Total remote attempts before falling back")
    .option("--timeout <ms>", "Per-attempt timeout in milliseconds")
    .option("--offline", "Skip the remote endpoint and use the templates")
    .option("--prompt-only", "Print the prompt without generating")
    .option("-o, --output [file]", "Export the copy to a text file")
    .option("--json", "Output result as JSON")
    .action(async (productId: string, options: GenerateCommandOptions) => {
      try {
        if (options.promptOnly) {
          const config = loadConfig();
          const product = requireProduct(loadProducts(options, config), productId);
          console.log(buildPrompt(buildRequest(product, options, config), { currency: config.currency }));
          return;
        }

        const { config, session, pipeline } = createContext(options);
        const product = requireProduct(loadProducts(options, config), productId);
        const request = buildRequest(product, options, config);

        if (!options.json) {
          logger.startSpinner(`Generating ${getContentTypeLabel(request.contentType).toLowerCase()} for ${product.name}...`);
        }
        const generation = await pipeline.generate(request);
        if (generation.result.source === "remote") {
          logger.succeedSpinner("Copy generated");
        } else {
          logger.failSpinner("Remote generation unavailable");
        }

        if (options.json) {
          const kpis = calculateKpis(generation.snapshot);
          logger.json({ ...generation, kpis, roi: calculateRoi(kpis, session.settings) });
        } else {
          printGeneration(generation);
        }

        if (options.output) {
          const path = exportContent(generation.result.text, resolveExportTarget(options.output, config.reportsDir));
          logger.success(`Saved to ${path}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("types")
    .description("List available content types")
    .action(() => {
      logger.header("Available Content Types");
      for (const type of listContentTypes()) {
        console.log(chalk.cyan("•"), type, chalk.gray(`(${getContentTypeLabel(type)})`));
      }
    });

  program
    .command("tones")
    .description("List available tones")
    .action(() => {
      logger.header("Available Tones");
      for (const tone of listTones()) {
        console.log(chalk.cyan("•"), tone);
      }
    });

  program
    .command("languages")
    .description("List available languages")
    .action(() => {
      logger.header("Available Languages");
      for (const language of listLanguages()) {
        console.log(chalk.cyan("•"), language);
      }
    });
}
