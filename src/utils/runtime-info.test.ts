import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { getCliVersion } from "./runtime-info.js";

describe("getCliVersion", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tempDirs.length = 0;
  });

  async function makeTempDir(): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "storefront-qa-version-"));
    tempDirs.push(dir);
    return dir;
  }

  it("reads the version of this package", () => {
    expect(getCliVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("walks up to the nearest package.json", async () => {
    const root = await makeTempDir();
    const nested = path.join(root, "dist", "bin");
    await fs.mkdir(nested, { recursive: true });
    await fs.writeFile(path.join(root, "package.json"), JSON.stringify({ version: "2.4.1" }));

    expect(getCliVersion(nested)).toBe("2.4.1");
  });

  it("falls back when the nearest package.json has no usable version", async () => {
    const root = await makeTempDir();
    await fs.writeFile(path.join(root, "package.json"), "{ not json");

    expect(getCliVersion(root)).toBe("0.1.0");
  });
});
