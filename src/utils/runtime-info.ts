import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const VERSION_FALLBACK = "0.1.0";

const packageVersionSchema = z.object({ version: z.string().trim().min(1) });

export function getCliVersion(startDir = path.dirname(fileURLToPath(import.meta.url))): string {
  const packageJsonPath = findNearestPackageJson(startDir);
  if (!packageJsonPath) return VERSION_FALLBACK;
  return readPackageVersion(packageJsonPath) ?? VERSION_FALLBACK;
}

function findNearestPackageJson(startDir: string): string | undefined {
  let current = startDir;
  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

function readPackageVersion(packageJsonPath: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  } catch {
    return undefined;
  }
  const parsed = packageVersionSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : undefined;
}
