import type { Command } from "commander";
import { runStorefrontQa, type RunCliOptions } from "../app/services/run-service.js";
import { handleError } from "../utils/errors.js";
import {
  asOptionalBoolean,
  asOptionalString,
  asOptionRecord,
  parseStringList,
} from "./parse-helpers.js";

export function registerRun(program: Command) {
  program
    .command("run")
    .description("Test one or more product pages and report website bugs")
    .argument("<url...>", "Product page URLs")
    .option("--mode <mode>", "Step plan: quick (5 steps) or full (12 steps)")
    .option("--headed", "Run browser in headed mode (visible)")
    .option("--browser <name>", "Browser engine: chromium, firefox or webkit")
    .option("--timeout <ms>", "Page load timeout in milliseconds")
    .option("--concurrency <n>", "Products tested in parallel")
    .option("--selectors <path>", "Selector configuration file (JSON or YAML)")
    .option("--name <label>", "Display name for a single product")
    .action(async (urls: unknown, opts: unknown) => {
      try {
        await runStorefrontQa(parseStringList(urls), parseRunCliOptions(opts));
      } catch (err) {
        handleError(err);
      }
    });
}

export function parseRunCliOptions(value: unknown): RunCliOptions {
  const record = asOptionRecord(value);
  const options: RunCliOptions = {};
  const mode = asOptionalString(record["mode"]);
  const headed = asOptionalBoolean(record["headed"]);
  const browser = asOptionalString(record["browser"]);
  const timeout = asOptionalString(record["timeout"]);
  const concurrency = asOptionalString(record["concurrency"]);
  const selectors = asOptionalString(record["selectors"]);
  const name = asOptionalString(record["name"]);
  if (mode !== undefined) options.mode = mode;
  if (headed !== undefined) options.headed = headed;
  if (browser !== undefined) options.browser = browser;
  if (timeout !== undefined) options.timeout = timeout;
  if (concurrency !== undefined) options.concurrency = concurrency;
  if (selectors !== undefined) options.selectors = selectors;
  if (name !== undefined) options.name = name;
  return options;
}
