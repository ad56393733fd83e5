#!/usr/bin/env node
/**
 * List fandoms from the archive's category index pages
 *
 * Usage: npm start -- [options]
 * Example: npm start -- --category anime --category tv --min-works 1000 --output table
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { CATEGORIES, CATEGORY_NAMES, type CategoryName, isCategoryName } from "./categories.js";
import { OutputError, UsageError } from "./errors.js";
import { Fetcher } from "./fetcher.js";
import { renderRecords } from "./format.js";
import { writeOutput } from "./output.js";
import { type FandomRecord, OUTPUT_FORMATS, type OutputFormat, type Verbosity } from "./types.js";
import { getBaseUrl, hasHelpFlag, parseIntegerArg, uniqueInOrder, validateUrl } from "./utils.js";

/** Exit code for invalid arguments */
export const EXIT_USAGE = 2;

export interface CliOptions {
  format: OutputFormat;
  categories: CategoryName[];
  verbosity: Verbosity;
  minWorks: number;
  /** Output file, or null for stdout */
  file: string | null;
  baseUrl: string | undefined;
  showHelp: boolean;
}

/**
 * Print usage information.
 */
export function showUsage(): void {
  console.log("Usage: fandom-index [options]");
  console.log("");
  console.log("Scrape the archive's category index pages for fandoms and their work counts.");
  console.log("");
  console.log("Options:");
  console.log(`  --output, -o <format>   Output format: ${OUTPUT_FORMATS.join(", ")} (default: text)`);
  console.log("  --category, -c <name>   Category to scrape, repeatable (default: all)");
  console.log(`                          ${CATEGORY_NAMES.join(", ")}`);
  console.log("  --verbose, -v           Enable verbose output");
  console.log("  --quiet, -q             Disable all progress output (overrides --verbose)");
  console.log("  --min-works, -m <n>     Minimum number of works a fandom needs (default: 0)");
  console.log("  --file, -f <path>       Write results to a file instead of stdout");
  console.log("  --base-url <url>        Archive origin (default: https://archiveofourown.org)");
  console.log("  --help, -h              Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  fandom-index -c anime -c tv -m 1000 -o table");
}

/** Flags that take values */
const VALUE_FLAGS = ["--output", "-o", "--category", "-c", "--min-works", "-m", "--file", "-f", "--base-url"];

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @throws {UsageError} On an unknown flag, a missing value or a value outside its allowed set
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  const options: CliOptions = {
    format: "text",
    categories: [],
    verbosity: 1,
    minWorks: 0,
    file: null,
    baseUrl: undefined,
    showHelp: hasHelpFlag(args, VALUE_FLAGS),
  };
  if (options.showHelp) {
    return options;
  }

  let verbose = false;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const takesValue = VALUE_FLAGS.includes(arg);
    if (takesValue && i + 1 >= args.length) {
      throw new UsageError(`${arg} requires a value`);
    }
    const value = takesValue ? args[++i] : "";

    switch (arg) {
      case "--output":
      case "-o": {
        if (!isOutputFormat(value)) {
          throw new UsageError(`Invalid output format "${value}" (choose from ${OUTPUT_FORMATS.join(", ")})`);
        }
        options.format = value;
        break;
      }
      case "--category":
      case "-c": {
        if (!isCategoryName(value)) {
          throw new UsageError(`Invalid category "${value}" (choose from ${CATEGORY_NAMES.join(", ")})`);
        }
        options.categories.push(value);
        break;
      }
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--quiet":
      case "-q":
        quiet = true;
        break;
      case "--min-works":
      case "-m": {
        const parsed = parseIntegerArg(value);
        if (parsed === null) {
          throw new UsageError(`Invalid work count "${value}" (expected an integer)`);
        }
        options.minWorks = parsed;
        break;
      }
      case "--file":
      case "-f":
        options.file = value;
        break;
      case "--base-url": {
        const validation = validateUrl(value);
        if (!validation.isValid) {
          throw new UsageError(`Invalid base URL "${value}": ${validation.error}`);
        }
        options.baseUrl = getBaseUrl(value);
        break;
      }
      default:
        throw new UsageError(`Unknown argument "${arg}"`);
    }
  }

  options.verbosity = quiet ? 0 : verbose ? 2 : 1;
  options.categories = uniqueInOrder(options.categories.length > 0 ? options.categories : CATEGORY_NAMES);
  return options;
}

/**
 * Main entry point.
 * Fetches every selected category, then renders and writes the combined list.
 *
 * @returns Process exit code: 0 on success, 1 if fetching or writing fails, 2 on invalid arguments
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      showUsage();
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.showHelp) {
    showUsage();
    return 0;
  }

  const fetcher = new Fetcher({ baseUrl: options.baseUrl, verbosity: options.verbosity });

  let fandoms: FandomRecord[];
  try {
    fandoms = await fetcher.fetchAll(
      options.categories.map((category) => CATEGORIES[category]),
      options.minWorks,
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to fetch fandoms: ${message}`);
    return 1;
  }

  try {
    await writeOutput(renderRecords(options.format, fandoms), options.file);
  } catch (error) {
    if (error instanceof OutputError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  return 0;
}

// Only run main when executed directly (not when imported for testing)
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Error:", error);
      process.exitCode = 1;
    },
  );
}
