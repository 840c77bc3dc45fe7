import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ValidationError, UserError, errorCode, errorMessage } from "../../utils/errors.js";

const selectorValueSchema = z.union([z.string(), z.array(z.string())]);
const selectorNamespaceSchema = z.record(selectorValueSchema);

// Top-level string entries (version, platform) are metadata; objects are namespaces.
export const selectorConfigSchema = z.record(z.union([z.string(), selectorNamespaceSchema]));

export type SelectorValue = z.infer<typeof selectorValueSchema>;
export type SelectorNamespace = z.infer<typeof selectorNamespaceSchema>;
export type SelectorConfigDocument = z.infer<typeof selectorConfigSchema>;

export class SelectorConfigError extends ValidationError {
  constructor(configPath: string, issues: string[]) {
    super(`Invalid selector configuration: ${configPath}`, issues);
    this.name = "SelectorConfigError";
  }
}

export class SelectorPersistError extends UserError {
  constructor(
    readonly targetPath: string,
    readonly reason: unknown
  ) {
    super(
      `Failed to save selector configuration to ${targetPath}: ${errorMessage(reason)}`,
      "Check that the directory is writable and try again."
    );
    this.name = "SelectorPersistError";
  }
}

export type SelectorConfigSource = "file" | "defaults";

function isYamlPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
}

export function parseSelectorConfig(content: string, configPath: string): SelectorConfigDocument {
  let raw: unknown;
  try {
    raw = isYamlPath(configPath) ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new SelectorConfigError(configPath, [`parse error: ${errorMessage(err)}`]);
  }

  const parsed = selectorConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new SelectorConfigError(
      configPath,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Reads a selector configuration file. A missing file yields `undefined`;
 * unreadable or malformed content throws.
 */
export async function readSelectorConfig(
  configPath: string
): Promise<SelectorConfigDocument | undefined> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw new UserError(
      `Failed to read selector configuration: ${configPath}`,
      "Check file permissions and try again."
    );
  }
  return parseSelectorConfig(content, configPath);
}

export function serializeSelectorConfig(
  document: SelectorConfigDocument,
  targetPath: string
): string {
  if (isYamlPath(targetPath)) {
    return yaml.dump(document, { lineWidth: -1 });
  }
  return JSON.stringify(document, null, 2) + "\n";
}

export async function writeSelectorConfig(
  document: SelectorConfigDocument,
  targetPath: string
): Promise<void> {
  try {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.writeFile(targetPath, serializeSelectorConfig(document, targetPath), "utf-8");
  } catch (err) {
    throw new SelectorPersistError(targetPath, err);
  }
}
