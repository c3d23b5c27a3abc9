import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import { calculateKpis, calculateRoi, currentSnapshot } from "../../lib/analytics.js";
import { exportContent } from "../../lib/export.js";
import { type BatchOutcome, DEFAULT_CONCURRENCY } from "../../lib/pipeline.js";
import { getContentTypeLabel } from "../../lib/prompts.js";
import type { Kpis, RoiSummary } from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import {
  type RuntimeOptions,
  buildRequest,
  createContext,
  fail,
  loadProducts,
  parseInteger,
  requireProduct,
} from "../shared.js";

interface BatchCommandOptions extends RuntimeOptions {
  ids?: string;
  concurrency: string;
  export?: boolean;
}

/** Joins successful outcomes into one report, in input order. */
export function formatBatchReport(outcomes: readonly BatchOutcome[]): string {
  return outcomes
    .flatMap((outcome) => {
      if (!outcome.ok) return [];
      const { request, text } = outcome.result;
      return [
        `# ${request.product.name} (${request.product.id}) - ${getContentTypeLabel(request.contentType)}\n\n${text}`,
      ];
    })
    .join("\n\n---\n\n");
}

export function printSummary(kpis: Kpis, roi: RoiSummary, currency: string): void {
  const money = (value: number) => `${value.toFixed(2)} ${currency}`;
  logger.header("Summary");
  logger.label("Pieces generated", kpis.generationsCount);
  logger.label("Time saved", `${kpis.timeSavedHours}h`);
  logger.label("Avg minutes per piece", kpis.avgMinutesPerGeneration);
  logger.label("Fallback rate", `${(kpis.fallbackRate * 100).toFixed(1)}%`);
  logger.label("Manual cost", money(roi.manualCost));
  logger.label("AI cost", money(roi.aiCost));
  logger.label("Net savings", money(roi.netSavings));
  logger.label("ROI", `${roi.roiPercentage}%`);
}

export function registerBatchCommand(program: Command): void {
  program
    .command("batch")
    .description("Generate copy for every catalog product, or a selection")
    .option("--ids <ids>", "Comma-separated product ids")
    .option("-t, --type <type>", "Content type")
    .option("--tone <tone>", "Tone")
    .option("-l, --language <language>", "Language")
    .option("-c, --catalog <path>", "Catalog CSV file")
    .option("--concurrency <count>", "Requests in flight at once", String(DEFAULT_CONCURRENCY))
    .option("--max-retries <count>", "Total remote attempts before falling back")
    .option("--timeout <ms>", "Per-attempt timeout in milliseconds")
    .option("--offline", "Skip the remote endpoint and use the templates")
    .option("--export", "Export all generated copy to one report file")
    .option("--json", "Output results as JSON")
    .action(async (options: BatchCommandOptions) => {
      try {
        const concurrency = parseInteger(options.concurrency, "concurrency", 1);
        const { config, session, pipeline } = createContext(options);
        const products = loadProducts(options, config);
        const selected = options.ids
          ? options.ids
              .split(",")
              .map((id) => id.trim())
              .filter((id) => id !== "")
              .map((id) => requireProduct(products, id))
          : products;
        const requests = selected.map((product) => buildRequest(product, options, config));

        if (!options.json) {
          logger.header("Batch Generation");
          logger.label("Products", requests.length);
          logger.label("Concurrency", concurrency);
          logger.divider();
        }

        const outcomes = await pipeline.generateBatch(requests, {
          concurrency,
          onProgress: (completed, total, outcome) => {
            if (options.json) return;
            if (!outcome.ok) {
              logger.step(completed, total, `${chalk.red("skipped")} ${outcome.request.product.id}: ${outcome.error.message}`);
              return;
            }
            const { result } = outcome;
            const source = result.source === "remote" ? chalk.green("remote") : chalk.yellow("fallback");
            logger.step(completed, total, `${result.request.product.name} ${chalk.gray("→")} ${source}`);
          },
        });

        const kpis = calculateKpis(currentSnapshot(session));
        const roi = calculateRoi(kpis, session.settings);

        if (options.json) {
          const rows = outcomes.map((outcome) =>
            outcome.ok ? outcome : { ...outcome, error: outcome.error.message }
          );
          logger.json({ outcomes: rows, kpis, roi });
        } else {
          printSummary(kpis, roi, config.currency);
        }

        if (options.export) {
          const path = exportContent(formatBatchReport(outcomes), { dir: resolve(config.reportsDir) });
          logger.success(`Saved to ${path}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
