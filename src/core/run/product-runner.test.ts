import { beforeEach, describe, expect, it, vi } from "vitest";
import type { BrowserLaunchers } from "../contracts/browser-launcher.js";
import { FakeElement, FakePage } from "../contracts/storefront-page.test-fixtures.js";
import { BASE_SELECTORS } from "../selectors/selector-defaults.js";
import { SelectorResolver } from "../selectors/selector-resolver.js";
import {
  TEST_PRODUCT,
  TimeoutError,
  createCheckHarness,
} from "../steps/checks/check-context.test-fixtures.js";
import { PRODUCT_PRICE_META } from "../steps/checks/check-selectors.js";
import { createPlannedSteps } from "../steps/step-plans.js";
import type { StepDefinition } from "../steps/step-context.js";
import { cartUrlFor, runProductTest, runStepSequence, tallySteps } from "./product-runner.js";

const { uiMock } = vi.hoisted(() => {
  const spinnerMock = { start: vi.fn(), stop: vi.fn(), fail: vi.fn() };
  spinnerMock.start.mockReturnValue(spinnerMock);
  return {
    uiMock: {
      heading: vi.fn(),
      info: vi.fn(),
      dim: vi.fn(),
      success: vi.fn(),
      error: vi.fn(),
      skip: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      spinner: vi.fn(() => spinnerMock),
    },
  };
});

vi.mock("../../utils/ui.js", () => ({ ui: uiMock }));

function fakeLaunchers(page: FakePage) {
  const context = { newPage: vi.fn(async () => page), close: vi.fn(async () => {}) };
  const browser = { newContext: vi.fn(async () => context), close: vi.fn(async () => {}) };
  const launch = vi.fn(async () => browser);
  const launchers: BrowserLaunchers = {
    chromium: { launch },
    firefox: { launch: vi.fn() },
    webkit: { launch: vi.fn() },
  };
  return { launchers, launch, browser, context };
}

const RUN_OPTIONS = { timeout: 1_000, actionTimeoutMs: 100, detectWaitMs: 0 };

function storefrontResolver(): SelectorResolver {
  return new SelectorResolver(
    {
      [BASE_SELECTORS]: {
        product_title: "h1.title",
        product_price: ".price",
        add_to_cart_button: "#add",
        cart_count: "#cart-count",
        checkout_button: "#checkout",
      },
    },
    { fallbacks: {} }
  );
}

function workingStorefront(): FakePage {
  const page = new FakePage();
  const cartCount = new FakeElement({ text: "0" });
  page.register("h1.title", new FakeElement({ text: "Trail Bike" }));
  page.register(".price", new FakeElement({ text: "$1,299.00" }));
  page.register(
    "#add",
    new FakeElement({
      onClick: () => {
        cartCount.text = "1";
      },
    })
  );
  page.register("#cart-count", cartCount);
  page.register("#checkout", new FakeElement());
  return page;
}

describe("runProductTest", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("runs the quick plan against a working storefront", async () => {
    const page = workingStorefront();
    const { launchers, launch, browser, context } = fakeLaunchers(page);

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(launch).toHaveBeenCalledWith({ headless: true });
    expect(page.defaultTimeout).toBe(1_000);
    expect(page.gotoCalls.map((call) => call.url)).toEqual([
      TEST_PRODUCT.url,
      "https://shop.test/cart",
    ]);
    expect(page.gotoCalls[0]?.options?.waitUntil).toBe("domcontentloaded");
    expect(result.status).toBe("passed");
    expect(result.mode).toBe("quick");
    expect(result.errors).toEqual([]);
    expect(result.summary).toEqual({ passed: 5, failed: 0, skipped: 0, pending: 0 });
    expect(result.steps.map((step) => step.message)).toEqual([
      `Page loaded: ${TEST_PRODUCT.url}`,
      "Title and price displayed (price: $1,299.00)",
      "Clicked add-to-cart (via #add)",
      "Cart updated, count: 1",
      "Cart page works; checkout button is available (via #checkout)",
    ]);
    expect(context.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("keeps going when a page read times out inside a check", async () => {
    const page = workingStorefront()
      .unregister("h1.title")
      .register("h1.title", new FakeElement({ text: "" }))
      .unregister(".price")
      .register(
        PRODUCT_PRICE_META,
        new FakeElement({
          visible: false,
          attributeError: new TimeoutError("locator.getAttribute: Timeout 100ms exceeded"),
        })
      );
    const { launchers } = fakeLaunchers(page);

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(result.status).toBe("passed");
    expect(result.errors).toEqual([]);
    expect(result.summary).toEqual({ passed: 5, failed: 0, skipped: 0, pending: 0 });
    expect(result.steps[1]?.message).toBe("Title is visible but empty, and no price was found");
  });

  it("records a browser that will not close without failing the run", async () => {
    const page = workingStorefront();
    const { launchers, browser, context } = fakeLaunchers(page);
    context.close.mockRejectedValue(new Error("context already closed"));

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(result.status).toBe("passed");
    expect(result.summary.passed).toBe(5);
    expect(result.errors).toEqual(["Could not close the browser context: context already closed"]);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(uiMock.warn).toHaveBeenCalledWith(
      "Could not close the browser context: context already closed"
    );
  });

  it("waits for the full load event in full mode", async () => {
    const page = workingStorefront();
    const { launchers } = fakeLaunchers(page);

    const result = await runProductTest(
      TEST_PRODUCT,
      storefrontResolver(),
      { ...RUN_OPTIONS, mode: "full" },
      { browserLaunchers: launchers }
    );

    expect(page.gotoCalls[0]?.options?.waitUntil).toBe("load");
    expect(result.steps).toHaveLength(12);
    expect(result.steps.every((step) => step.status !== "pending")).toBe(true);
  });

  it("fails the run when a step finds a website bug", async () => {
    const page = workingStorefront();
    page.unregister("#add");
    page.register(
      "#add",
      new FakeElement({ onClick: () => page.emitPageError("TypeError: cart is undefined") })
    );
    const { launchers } = fakeLaunchers(page);

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual([]);
    expect(result.summary.failed).toBe(1);
    expect(result.steps[2]?.issueDetails?.scriptErrors).toEqual(["TypeError: cart is undefined"]);
  });

  it("aborts when the product page cannot be opened and leaves later steps pending", async () => {
    const page = new FakePage();
    page.gotoError = new Error("net::ERR_CONNECTION_REFUSED");
    const { launchers, browser, context } = fakeLaunchers(page);

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(result.status).toBe("failed");
    expect(result.summary).toEqual({ passed: 0, failed: 0, skipped: 1, pending: 4 });
    expect(result.steps[0]?.classification).toBe("network_error");
    expect(result.errors).toEqual([
      `Could not open product page ${TEST_PRODUCT.url}: Page access: hit a network error`,
    ]);
    expect(uiMock.error).toHaveBeenCalledWith(
      `Run aborted for Trail Bike: Could not open product page ${TEST_PRODUCT.url}: Page access: hit a network error`
    );
    expect(context.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it("reports a missing browser install", async () => {
    const launch = vi.fn(async () => {
      throw new Error("browserType.launch: Executable doesn't exist at /tmp/chromium");
    });
    const launchers: BrowserLaunchers = {
      chromium: { launch },
      firefox: { launch: vi.fn() },
      webkit: { launch: vi.fn() },
    };

    const result = await runProductTest(TEST_PRODUCT, storefrontResolver(), RUN_OPTIONS, {
      browserLaunchers: launchers,
    });

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(["chromium browser is not installed."]);
    expect(result.summary.pending).toBe(5);
  });
});

describe("runStepSequence", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("skips a step whose check returns without an outcome", async () => {
    const { context } = createCheckHarness();
    const silent: StepDefinition = {
      id: "page-structure",
      name: "Page structure",
      description: "Check the landmarks",
      run: async () => {},
    };
    const [planned] = createPlannedSteps([silent]);
    if (!planned) throw new Error("expected one planned step");

    await runStepSequence([planned], context);

    expect(planned.step.status).toBe("skipped");
    expect(planned.step.message).toBe("Page structure did not report an outcome");
  });

  it("settles a step whose check throws and stops the sequence", async () => {
    const { context } = createCheckHarness();
    const broken: StepDefinition = {
      id: "product-title",
      name: "Product title",
      description: "Read the title",
      run: async () => {
        throw new RangeError("bad index");
      },
    };
    const after: StepDefinition = {
      id: "product-price",
      name: "Product price",
      description: "Read the price",
      run: vi.fn(async () => {}),
    };
    const planned = createPlannedSteps([broken, after]);

    await expect(runStepSequence(planned, context)).rejects.toThrow("bad index");

    expect(planned[0]?.step.status).toBe("skipped");
    expect(planned[0]?.step.message).toBe(
      "Skipped (test error): Product title: the test logic raised an error"
    );
    expect(planned[0]?.step.error).toBe("bad index");
    expect(planned[1]?.step.status).toBe("pending");
    expect(after.run).not.toHaveBeenCalled();
  });
});

describe("run helpers", () => {
  it("builds the cart URL on the product's origin", () => {
    expect(cartUrlFor("https://shop.test/products/trail-bike?variant=2", "/cart")).toBe(
      "https://shop.test/cart"
    );
  });

  it("counts settled and pending steps", () => {
    expect(
      tallySteps([
        { number: 1, name: "a", description: "", status: "passed", message: "" },
        { number: 2, name: "b", description: "", status: "skipped", message: "" },
        { number: 3, name: "c", description: "", status: "pending", message: "" },
      ])
    ).toEqual({ passed: 1, failed: 0, skipped: 1, pending: 1 });
  });
});
