import chalk from "chalk";
import ora from "ora";
import type { FileChangeSet } from "../types";

/**
 * Format a date as `[YYYY-MM-DD HH:MM:SS]` in local time
 */
export function formatTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(
    date.getDate()
  )}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(
    date.getSeconds()
  )}`;
  return `[${day} ${time}]`;
}

/**
 * Logger utility for consistent output formatting
 */
export class Logger {
  private verbose: boolean;
  private spinner = ora();

  constructor(verbose: boolean = true) {
    this.verbose = verbose;
  }

  /**
   * Log a message if verbose mode is enabled
   */
  log(message: string): void {
    if (!this.verbose) {
      return;
    }
    if (this.spinner.isSpinning) {
      this.spinner.clear();
      console.log(message);
      this.spinner.render();
    } else {
      console.log(message);
    }
  }

  /**
   * Log a message prefixed with a dimmed timestamp
   */
  private stamped(message: string): void {
    this.log(`${chalk.dim(formatTimestamp())} ${message}`);
  }

  warn(message: string): void {
    this.log(chalk.yellow(message));
  }

  /**
   * Errors are printed even in quiet mode
   */
  error(message: string): void {
    console.error(chalk.red(message));
  }

  startSpinner(message: string): void {
    if (this.verbose) {
      this.spinner.start(message);
    }
  }

  /**
   * Clear the spinner line without leaving a status symbol behind
   */
  stopSpinner(): void {
    if (this.spinner.isSpinning) {
      this.spinner.stop();
    }
  }

  /**
   * Log a translated string. `scope` is the language code, or INLINE.
   */
  logChange(
    original: string,
    translated: string,
    scope: string,
    dryRun: boolean
  ): void {
    const icon = dryRun ? chalk.cyan("🔍") : chalk.yellow("✏️");
    this.stamped(
      `${icon} [${chalk.blue(scope.toUpperCase())}] "${original}" ➜ "${translated}"`
    );
  }

  logFileSuccess(
    lang: string,
    count: number,
    filePath: string,
    dryRun: boolean
  ): void {
    if (dryRun) {
      this.stamped(
        `${chalk.cyan("💡")} ${lang.toUpperCase()} → would update ${count} entries in ${filePath}`
      );
    } else {
      this.stamped(
        `${chalk.green("✅")} ${lang.toUpperCase()} → updated ${count} entries in ${filePath}`
      );
    }
  }

  logNoChanges(lang: string, filePath: string): void {
    this.stamped(
      `${chalk.greenBright("🟢")} ${lang} has no missing translations in ${filePath}`
    );
  }

  logRetry(attempt: number, max: number, error: string): void {
    this.stamped(
      `${chalk.yellow("🔁")} Retry ${attempt}/${max} after error: ${error}`
    );
  }

  /**
   * Print the lines that differ between two versions of a file
   */
  logDiff(filePath: string, changeSet: FileChangeSet): void {
    this.stamped(`${chalk.blue("📝")} Diff for ${filePath}:`);
    for (const change of changeSet) {
      this.log(`  ${chalk.magenta("🔄")} Line ${change.lineNumber}:`);
      this.log(`    ${chalk.red(`- ${change.original}`)}`);
      this.log(`    ${chalk.green(`+ ${change.modified}`)}`);
    }
    this.log("");
  }
}
