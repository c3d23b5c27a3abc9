import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "../../lib/config.js";
import { formatPrice } from "../../lib/prompts.js";
import { logger } from "../../utils/logger.js";
import { type SelectorOptions, fail, loadProducts } from "../shared.js";

interface ProductsCommandOptions extends SelectorOptions {
  json?: boolean;
}

export function registerProductsCommand(program: Command): void {
  program
    .command("products")
    .description("List catalog products")
    .option("-c, --catalog <path>", "Catalog CSV file")
    .option("--json", "Output as JSON")
    .action((options: ProductsCommandOptions) => {
      try {
        const config = loadConfig();
        const products = loadProducts(options, config);

        if (options.json) {
          logger.json(products);
          return;
        }

        logger.header(`Products (${products.length})`);
        for (const product of products) {
          console.log(
            chalk.cyan(product.id.padEnd(8)),
            product.name,
            chalk.gray(`${product.category}, ${formatPrice(product.price, "english", config.currency)}`)
          );
        }
      } catch (error) {
        fail(error);
      }
    });
}
