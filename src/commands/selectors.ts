import type { Command } from "commander";
import {
  listSelectors,
  setSelector,
  type SetSelectorCliOptions,
} from "../app/services/selectors-service.js";
import { handleError } from "../utils/errors.js";
import {
  asOptionalFlagOrString,
  asOptionalString,
  asOptionRecord,
  parseRequiredArgument,
} from "./parse-helpers.js";

export function registerSelectors(program: Command) {
  const selectors = program
    .command("selectors")
    .description("Show the locator candidates each logical element resolves to")
    .enablePositionalOptions()
    .option("--type <namespace>", "Only show one namespace, such as base_selectors")
    .option("--selectors <path>", "Selector configuration file (JSON or YAML)")
    .action(async (opts: unknown) => {
      try {
        await listSelectors(parseSelectorsCliOptions(opts));
      } catch (err) {
        handleError(err);
      }
    });

  selectors
    .command("set")
    .description("Override the locator for a logical element")
    .argument("<key>", "Logical element key, such as add_to_cart_button")
    .argument("<value>", "Locator candidates, comma-separated")
    .option("--type <namespace>", "Namespace to update", "base_selectors")
    .option("--selectors <path>", "Selector configuration file (JSON or YAML)")
    .option("--save [path]", "Write the configuration back, optionally to another file")
    .action(async (key: unknown, value: unknown, opts: unknown) => {
      try {
        await setSelector(
          parseRequiredArgument(key, "key"),
          parseRequiredArgument(value, "value"),
          parseSelectorsCliOptions(opts)
        );
      } catch (err) {
        handleError(err);
      }
    });
}

export function parseSelectorsCliOptions(value: unknown): SetSelectorCliOptions {
  const record = asOptionRecord(value);
  const options: SetSelectorCliOptions = {};
  const type = asOptionalString(record["type"]);
  const selectorsPath = asOptionalString(record["selectors"]);
  const save = asOptionalFlagOrString(record["save"]);
  if (type !== undefined) options.type = type;
  if (selectorsPath !== undefined) options.selectors = selectorsPath;
  if (save !== undefined) options.save = save;
  return options;
}
