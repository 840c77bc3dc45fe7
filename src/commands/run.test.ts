import { Command } from "commander";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { UserError } from "../utils/errors.js";

vi.mock("../app/services/run-service.js", () => ({
  runStorefrontQa: vi.fn(),
}));

vi.mock("../utils/errors.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../utils/errors.js")>();
  return { ...actual, handleError: vi.fn() };
});

import { runStorefrontQa } from "../app/services/run-service.js";
import { handleError } from "../utils/errors.js";
import { parseRunCliOptions, registerRun } from "./run.js";

function buildProgram(): Command {
  const program = new Command();
  program.exitOverride();
  registerRun(program);
  return program;
}

describe("parseRunCliOptions", () => {
  it("keeps only recognised values of the expected type", () => {
    expect(
      parseRunCliOptions({
        mode: "full",
        headed: true,
        timeout: "5000",
        concurrency: 3,
        name: "Mug",
        extra: "ignored",
      })
    ).toEqual({ mode: "full", headed: true, timeout: "5000", name: "Mug" });
  });

  it("returns an empty object for anything that is not an options record", () => {
    expect(parseRunCliOptions(undefined)).toEqual({});
    expect(parseRunCliOptions("full")).toEqual({});
  });
});

describe("run command", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("passes every URL and the parsed flags to the run service", async () => {
    vi.mocked(runStorefrontQa).mockResolvedValue(undefined);

    await buildProgram().parseAsync(
      [
        "run",
        "https://shop.test/products/mug",
        "https://shop.test/products/cap",
        "--mode",
        "full",
        "--headed",
        "--browser",
        "firefox",
        "--concurrency",
        "2",
      ],
      { from: "user" }
    );

    expect(runStorefrontQa).toHaveBeenCalledWith(
      ["https://shop.test/products/mug", "https://shop.test/products/cap"],
      { mode: "full", headed: true, browser: "firefox", concurrency: "2" }
    );
    expect(handleError).not.toHaveBeenCalled();
  });

  it("routes a service failure to the error handler", async () => {
    const failure = new UserError("Invalid run mode: slow");
    vi.mocked(runStorefrontQa).mockRejectedValue(failure);

    await buildProgram().parseAsync(["run", "https://shop.test/products/mug", "--mode", "slow"], {
      from: "user",
    });

    expect(handleError).toHaveBeenCalledWith(failure);
  });
});
