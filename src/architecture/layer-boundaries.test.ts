import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";
import { describe, expect, it } from "vitest";

type Layer = "bin" | "root" | "commands" | "app" | "core" | "contracts" | "infra" | "utils";

const srcRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

// Layers each layer may import from, besides itself.
const allowedImports: Record<Layer, readonly Layer[]> = {
  bin: ["root"],
  root: ["commands", "utils"],
  commands: ["app", "utils"],
  app: ["core", "contracts", "infra", "utils"],
  core: ["contracts", "utils"],
  contracts: [],
  infra: ["contracts", "utils"],
  utils: [],
};

function layerForFile(filePath: string): Layer {
  const [first, second] = path.relative(srcRoot, filePath).split(path.sep);
  if (first === "core" && second === "contracts") return "contracts";
  switch (first) {
    case "bin":
    case "commands":
    case "app":
    case "core":
    case "infra":
    case "utils":
      return first;
    default:
      return "root";
  }
}

async function listProductionFiles(dir: string): Promise<string[]> {
  const out: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name !== "architecture") out.push(...(await listProductionFiles(fullPath)));
    } else if (entry.name.endsWith(".ts") && !/\.test(-fixtures)?\.ts$/.test(entry.name)) {
      out.push(fullPath);
    }
  }
  return out;
}

async function relativeImports(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf-8");
  return ts
    .preProcessFile(content, true, true)
    .importedFiles.map((ref) => ref.fileName)
    .filter((specifier) => specifier.startsWith("."))
    .map((specifier) => path.resolve(path.dirname(filePath), specifier.replace(/\.js$/, ".ts")));
}

async function buildImportGraph(): Promise<Map<string, string[]>> {
  const graph = new Map<string, string[]>();
  for (const file of await listProductionFiles(srcRoot)) {
    graph.set(file, await relativeImports(file));
  }
  return graph;
}

function toSrcPath(filePath: string): string {
  return path.relative(srcRoot, filePath).replaceAll(path.sep, "/");
}

describe("source layering", () => {
  it("imports only from permitted layers", async () => {
    const violations: string[] = [];
    for (const [file, imports] of await buildImportGraph()) {
      const from = layerForFile(file);
      for (const target of imports) {
        const to = layerForFile(target);
        if (to !== from && !allowedImports[from].includes(to)) {
          violations.push(`${toSrcPath(file)}: ${from} -> ${to} (${toSrcPath(target)})`);
        }
      }
    }
    expect(violations, violations.join("\n")).toEqual([]);
  });

  it("has no import cycles", async () => {
    const graph = await buildImportGraph();
    const cycles: string[] = [];
    const state = new Map<string, "visiting" | "done">();
    const trail: string[] = [];

    const visit = (file: string): void => {
      state.set(file, "visiting");
      trail.push(file);
      for (const next of graph.get(file) ?? []) {
        if (!graph.has(next)) continue;
        const seen = state.get(next);
        if (seen === "visiting") {
          cycles.push([...trail.slice(trail.indexOf(next)), next].map(toSrcPath).join(" -> "));
        } else if (seen === undefined) {
          visit(next);
        }
      }
      trail.pop();
      state.set(file, "done");
    };

    for (const file of graph.keys()) {
      if (!state.has(file)) visit(file);
    }
    expect(cycles, cycles.join("\n")).toEqual([]);
  });
});
