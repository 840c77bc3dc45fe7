import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { UserError, errorCode } from "./errors.js";

const configSchema = z.object({
  selectorsPath: z.string().min(1).optional(),
  mode: z.enum(["quick", "full"]).optional(),
  headed: z.boolean().optional(),
  timeout: z.number().int().positive().optional(),
  settleMs: z.number().int().nonnegative().optional(),
  detectWaitMs: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().optional(),
  cartPath: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
  browser: z.enum(["chromium", "firefox", "webkit"]).optional(),
});

export type StorefrontQaConfig = z.infer<typeof configSchema>;

export const CONFIG_FILENAME = "storefront-qa.config.yaml";

export async function loadConfig(cwd = process.cwd()): Promise<StorefrontQaConfig> {
  const configPath = path.resolve(cwd, CONFIG_FILENAME);
  let content: string;

  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      // No config file found; use defaults
      return {};
    }
    throw new UserError(
      `Failed to read config file: ${CONFIG_FILENAME}`,
      "Check file permissions and try again."
    );
  }

  let parsedYaml: unknown;

  try {
    parsedYaml = yaml.load(content);
  } catch {
    throw new UserError(
      `Invalid YAML syntax in ${CONFIG_FILENAME}`,
      "Fix YAML syntax in the config file and try again."
    );
  }

  if (parsedYaml == null) return {};

  const parsedConfig = configSchema.safeParse(parsedYaml);
  if (!parsedConfig.success) {
    const issues = parsedConfig.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");

    throw new UserError(
      `Invalid config in ${CONFIG_FILENAME}: ${issues}`,
      "Expected shape: { selectorsPath?: string, mode?: 'quick'|'full', headed?: boolean, timeout?: positive integer, settleMs?: non-negative integer, detectWaitMs?: positive integer, pollIntervalMs?: positive integer, cartPath?: string, concurrency?: positive integer, browser?: 'chromium'|'firefox'|'webkit' }."
    );
  }

  return parsedConfig.data;
}
