import ora, { type Ora } from "ora";
import chalk from "chalk";

let spinner: Ora | null = null;

export const logger = {
  info(message: string) {
    if (spinner?.isSpinning) spinner.stop();
    console.log(chalk.blue("ℹ"), message);
    if (spinner) spinner.start();
  },

  success(message: string) {
    if (spinner?.isSpinning) spinner.stop();
    console.log(chalk.green("✓"), message);
  },

  warning(message: string) {
    if (spinner?.isSpinning) spinner.stop();
    console.log(chalk.yellow("⚠"), message);
    if (spinner) spinner.start();
  },

  error(message: string) {
    if (spinner?.isSpinning) spinner.stop();
    console.error(chalk.red("✗"), message);
  },

  debug(message: string) {
    if (!process.env.DEBUG) return;
    if (spinner?.isSpinning) spinner.stop();
    console.log(chalk.gray("🔍"), message);
    if (spinner) spinner.start();
  },

  step(step: number, total: number, message: string) {
    if (spinner?.isSpinning) spinner.stop();
    console.log(chalk.cyan(`[${step}/${total}]`), message);
  },

  header(title: string) {
    console.log();
    console.log(chalk.bold.cyan(`═══ ${title} ═══`));
    console.log();
  },

  divider() {
    console.log(chalk.gray("─".repeat(50)));
  },

  label(label: string, value: string | number) {
    console.log(chalk.gray(label + ":"), value);
  },

  json(data: unknown) {
    console.log(JSON.stringify(data, null, 2));
  },

  startSpinner(message: string): Ora {
    spinner = ora({ text: message, color: "cyan" }).start();
    return spinner;
  },

  succeedSpinner(message: string) {
    if (spinner) {
      spinner.succeed(message);
      spinner = null;
    }
  },

  failSpinner(message: string) {
    if (spinner) {
      spinner.fail(message);
      spinner = null;
    }
  },

  stopSpinner() {
    if (spinner) {
      spinner.stop();
      spinner = null;
    }
  },
};
