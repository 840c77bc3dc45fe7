import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Product } from "../../core/products/product.js";
import type { ProductRunResult } from "../../core/run/product-runner.js";
import { UserError } from "../../utils/errors.js";
import { buildProducts, runStorefrontQa } from "./run-service.js";

const { uiMock } = vi.hoisted(() => ({
  uiMock: {
    info: vi.fn(),
    heading: vi.fn(),
    success: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    dim: vi.fn(),
    step: vi.fn(),
    debug: vi.fn(),
    table: vi.fn(),
  },
}));

vi.mock("../../utils/ui.js", () => ({ ui: uiMock }));

vi.mock("../../utils/config.js", () => ({
  loadConfig: vi.fn(async () => ({ selectorsPath: "/nonexistent/storefront-qa/selectors.json" })),
}));

vi.mock("playwright", () => ({
  chromium: { launch: vi.fn() },
  firefox: { launch: vi.fn() },
  webkit: { launch: vi.fn() },
}));

function resultFor(product: Product, status: ProductRunResult["status"]): ProductRunResult {
  return {
    productId: product.id,
    productName: product.name,
    url: product.url,
    mode: "quick",
    status,
    steps: [],
    summary: { passed: 5, failed: 0, skipped: 0, pending: 0 },
    errors: status === "failed" ? ["Could not open product page"] : [],
    startedAt: new Date(0).toISOString(),
    durationMs: 10,
  };
}

describe("buildProducts", () => {
  it("builds one product per URL", () => {
    expect(
      buildProducts(["https://shop.test/products/mug", "https://shop.test/products/cap"]).map(
        (product) => product.id
      )
    ).toEqual(["mug", "cap"]);
  });

  it("applies --name to a single URL", () => {
    expect(buildProducts(["https://shop.test/products/mug"], "Coffee Mug")[0]?.name).toBe(
      "Coffee Mug"
    );
  });

  it("rejects --name with several URLs", () => {
    expect(() =>
      buildProducts(["https://shop.test/products/mug", "https://shop.test/products/cap"], "Mug")
    ).toThrow("--name applies to a single product URL");
  });

  it("rejects an empty URL list", () => {
    expect(() => buildProducts([])).toThrow(UserError);
  });
});

describe("runStorefrontQa", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("runs each product and reports its tally", async () => {
    const runProduct = vi.fn(async (product: Product) => resultFor(product, "passed"));

    await runStorefrontQa(["https://shop.test/products/mug"], { mode: "full", timeout: "5000" }, {
      runProduct,
    });

    expect(runProduct).toHaveBeenCalledTimes(1);
    expect(runProduct.mock.calls[0]?.[0]).toMatchObject({ id: "mug" });
    expect(uiMock.warn).toHaveBeenCalledWith(
      "Selector config not found: /nonexistent/storefront-qa/selectors.json, using defaults"
    );
    expect(uiMock.success).toHaveBeenCalledWith("mug: 5 passed, 0 failed, 0 skipped (10ms)");
    expect(process.exitCode).toBeUndefined();
  });

  it("sets a failing exit code when a product run fails", async () => {
    const runProduct = vi.fn(async (product: Product) => resultFor(product, "failed"));

    await runStorefrontQa(["https://shop.test/products/mug"], {}, { runProduct });

    expect(uiMock.dim).toHaveBeenCalledWith("  Run error: Could not open product page");
    expect(process.exitCode).toBe(1);
  });
});
