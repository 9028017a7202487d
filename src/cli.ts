#!/usr/bin/env node
import { Command } from "commander";
import * as dotenv from "dotenv";
import chalk from "chalk";
import { CatalogWorkflow } from "./core/CatalogWorkflow";
import { InlineWorkflow } from "./core/InlineWorkflow";
import type {
  CatalogRunConfig,
  InlineRunConfig,
  TranslatorConfig,
} from "./types";
import {
  parseCount,
  parseLanguageList,
  resolveApiKey,
} from "./config/settings";
import { MissingCredentialError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";
import {
  CATALOG_EXTENSION,
  DEFAULT_FUNCTION_NAMES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MODEL,
  DEFAULT_RETRY_DELAY_MS,
  INLINE_EXTENSION,
} from "./utils/constants";

// Load environment variables
dotenv.config();

interface CommonOptions {
  dryRun: boolean;
  apiKey?: string;
  model: string;
  retries: string;
  delay: string;
  quiet: boolean;
}

interface InlineOptions extends CommonOptions {
  ext: string;
  function: string[];
}

interface CatalogOptions extends CommonOptions {
  lang: string;
  force: boolean;
  ext: string;
}

const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

function baseConfig(folder: string, options: CommonOptions): TranslatorConfig {
  return {
    root: folder,
    dryRun: options.dryRun,
    apiKey: resolveApiKey(options.apiKey),
    modelName: options.model,
    verbose: !options.quiet,
    maxRetries: parseCount(options.retries, "--retries"),
    retryDelay: parseCount(options.delay, "--delay"),
  };
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--dry-run", "Show what would change without writing files", false)
    .option("--api-key <key>", "OpenAI API key (defaults to OPENAI_API_KEY)")
    .option("-m, --model <name>", "AI model name", DEFAULT_MODEL)
    .option(
      "-r, --retries <number>",
      "Maximum number of API call retries",
      String(DEFAULT_MAX_RETRIES)
    )
    .option(
      "-d, --delay <ms>",
      "Base retry delay in milliseconds, doubled on every retry",
      String(DEFAULT_RETRY_DELAY_MS)
    )
    .option("-q, --quiet", "Only print errors", false);
}

function fail(error: unknown): never {
  new Logger().error(`\n❌ Translation failed: ${errorMessage(error)}`);
  if (error instanceof MissingCredentialError) {
    console.log(
      chalk.yellow(
        "💡 Set it in a .env file or export it in your shell. For example:"
      )
    );
    console.log(chalk.cyan("  echo 'OPENAI_API_KEY=your-key-here' > .env"));
  }
  process.exit(1);
}

// Create command line interface
const program = new Command();

program
  .name("gettext-translate")
  .description("Translate gettext() strings or .po files using OpenAI")
  .version("0.1.0");

withCommonOptions(
  program
    .command("inline")
    .description("Translate gettext() literals in source files to English")
    .argument("<folder>", "Path to scan")
    .option("--ext <extension>", "Source file extension", INLINE_EXTENSION)
    .option(
      "--function <name>",
      "Translation function to look for (repeatable)",
      collect,
      []
    )
).action(async (folder: string, options: InlineOptions) => {
  try {
    const config: InlineRunConfig = {
      ...baseConfig(folder, options),
      extension: options.ext,
      functionNames:
        options.function.length > 0 ? options.function : DEFAULT_FUNCTION_NAMES,
    };

    const summary = await new InlineWorkflow(config).execute();
    if (config.verbose) {
      console.log(
        chalk.cyan(
          `📂 Scanned ${summary.files} files, ${summary.changedFiles.length} ${
            config.dryRun ? "would change" : "changed"
          }`
        )
      );
    }
  } catch (error) {
    fail(error);
  }
});

withCommonOptions(
  program
    .command("catalog")
    .description("Fill in missing translations in .po catalogs")
    .argument("<folder>", "Root folder holding one sub-folder per language")
    .requiredOption(
      "-l, --lang <codes>",
      "Comma-separated list of target languages"
    )
    .option(
      "-f, --force",
      "Re-translate all entries, even if they have a value",
      false
    )
    .option("--ext <extension>", "Catalog file extension", CATALOG_EXTENSION)
).action(async (folder: string, options: CatalogOptions) => {
  try {
    const config: CatalogRunConfig = {
      ...baseConfig(folder, options),
      languages: parseLanguageList(options.lang),
      force: options.force,
      extension: options.ext,
    };

    const summary = await new CatalogWorkflow(config).execute();
    if (config.verbose) {
      console.log(
        chalk.cyan(
          `📂 ${summary.files} catalogs, ${summary.entries} entries ${
            config.dryRun ? "would be updated" : "updated"
          }`
        )
      );
    }
  } catch (error) {
    fail(error);
  }
});

program.parseAsync(process.argv).catch(fail);
