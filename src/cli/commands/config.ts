import { Command } from "commander";
import chalk from "chalk";
import {
  CONFIG_KEYS,
  loadConfig,
  resetConfig,
  resolveApiKey,
  setConfigValue,
} from "../../lib/config.js";
import { getConfigPath } from "../../utils/paths.js";
import { logger } from "../../utils/logger.js";
import { fail } from "../shared.js";

export function registerConfigCommand(program: Command): void {
  const config = program
    .command("config")
    .description("View and edit configuration");

  config
    .command("show")
    .description("Show current configuration")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      try {
        const cfg = loadConfig();

        if (options.json) {
          logger.json(cfg);
          return;
        }

        logger.header("Configuration");
        logger.label("Config file", getConfigPath());
        console.log();
        logger.label("Endpoint", cfg.endpoint.baseURL);
        logger.label("Model", cfg.endpoint.model);
        logger.label("Max retries", cfg.generation.maxRetries);
        logger.label("Timeout", `${cfg.generation.timeoutMs}ms`);
        logger.label("Catalog", cfg.catalogPath);
        logger.label("Reports", cfg.reportsDir);
        logger.label("Currency", cfg.currency);
        logger.label(
          "Defaults",
          `${cfg.defaults.contentType} / ${cfg.defaults.tone} / ${cfg.defaults.language}`
        );

        console.log();
        console.log(chalk.bold("Environment:"));
        logger.label("INFERENCE_API_KEY", resolveApiKey() ? chalk.green("Set") : chalk.red("Not set"));
      } catch (error) {
        fail(error);
      }
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      try {
        setConfigValue(key, value);
        logger.success(`Set ${key} = ${value}`);
      } catch (error) {
        fail(error);
      }
    });

  config
    .command("reset")
    .description("Reset configuration to defaults")
    .action(() => {
      try {
        resetConfig();
        logger.success("Configuration reset to defaults");
      } catch (error) {
        fail(error);
      }
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      console.log(getConfigPath());
    });
}
