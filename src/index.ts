import { Command } from "commander";
import { registerRun } from "./commands/run.js";
import { registerSelectors } from "./commands/selectors.js";
import { handleError } from "./utils/errors.js";
import { getCliVersion } from "./utils/runtime-info.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("storefront-qa")
    .description("Storefront QA: drive product pages and report only genuine website bugs")
    .version(getCliVersion());

  registerRun(program);
  registerSelectors(program);

  return program;
}

export function run() {
  const program = createProgram();
  program.parseAsync().catch(handleError);
}
