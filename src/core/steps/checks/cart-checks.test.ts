import { describe, expect, it, vi } from "vitest";
import { FakeElement } from "../../contracts/storefront-page.test-fixtures.js";
import { BASE_SELECTORS, CHECKOUT_SELECTORS } from "../../selectors/selector-defaults.js";
import {
  TimeoutError,
  createCheckHarness,
  startedStep,
} from "./check-context.test-fixtures.js";
import {
  checkCartVerification,
  checkCheckoutAvailability,
  checkCheckoutFlow,
} from "./cart-checks.js";

vi.mock("../../../utils/ui.js", () => ({
  ui: {
    info: vi.fn(),
    dim: vi.fn(),
    success: vi.fn(),
    error: vi.fn(),
    skip: vi.fn(),
    debug: vi.fn(),
  },
}));

const CHECKOUT_BUTTON = "button[name='checkout']";

describe("checkCartVerification", () => {
  const selectors = { [BASE_SELECTORS]: { cart_count: "#cart-count" } };

  it("reports the cart count", async () => {
    const { page, context } = createCheckHarness({ selectors });
    page.register("#cart-count", new FakeElement({ text: " 1 " }));
    const step = startedStep("Cart verification", 4);

    await checkCartVerification(step, context);

    expect(step.message).toBe("Cart updated, count: 1");
  });

  it("passes with a caveat when the count stays at zero", async () => {
    const { page, context } = createCheckHarness({ selectors });
    page.register("#cart-count", new FakeElement({ text: "0" }));
    const step = startedStep("Cart verification", 4);

    await checkCartVerification(step, context);

    expect(step.status).toBe("passed");
    expect(step.message).toBe(
      "No cart count change detected (the cart may need a refresh or a visit to the cart page)"
    );
  });

  it("skips when the theme shows no cart count", async () => {
    const { context } = createCheckHarness({ selectors });
    const step = startedStep("Cart verification", 4);

    await checkCartVerification(step, context);

    expect(step.status).toBe("skipped");
    expect(step.toRecord().classification).toBe("missing_feature");
  });

  it("fails when the badge is hidden and the page raised script errors", async () => {
    const { page, context } = createCheckHarness({ selectors });
    page.register("#cart-count", new FakeElement({ visible: false, text: "1" }));
    page.emitPageError("TypeError: cart drawer is undefined");
    const step = startedStep("Cart verification", 4);

    await checkCartVerification(step, context);

    expect(step.status).toBe("failed");
    expect(step.issueDetails?.problem).toBe("Cart count badge exists but is not visible");
    expect(step.issueDetails?.classification.rule).toBe("hidden-with-script-errors");
  });

  it("skips a hidden badge on a quiet page as hidden by design", async () => {
    const { page, context } = createCheckHarness({ selectors });
    page.register("#cart-count", new FakeElement({ visible: false, text: "0" }));
    const step = startedStep("Cart verification", 4);

    await checkCartVerification(step, context);

    expect(step.status).toBe("skipped");
    expect(step.message).toBe(
      "Skipped (missing feature): Cart verification: the UI element exists but is hidden, likely lazy-loaded or hidden by design"
    );
  });
});

describe("checkCheckoutAvailability", () => {
  it("opens the cart page and finds the checkout button", async () => {
    const { page, context } = createCheckHarness();
    page.register(CHECKOUT_BUTTON, new FakeElement());
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(page.gotoCalls).toEqual([
      { url: "https://shop.test/cart", options: { waitUntil: "domcontentloaded", timeout: 1_000 } },
    ]);
    expect(page.waits).toEqual([10]);
    expect(step.message).toBe(
      "Cart page works; checkout button is available (via button[name='checkout'])"
    );
  });

  it("skips when the cart page redirects elsewhere", async () => {
    const { page, context } = createCheckHarness();
    page.onGoto = () => {
      page.currentUrl = "https://shop.test/account/login";
    };
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(step.status).toBe("skipped");
    expect(step.message).toBe("Cart page redirected elsewhere: https://shop.test/account/login");
  });

  it("skips when the cart is empty", async () => {
    const { page, context } = createCheckHarness();
    page.register(".cart-empty", new FakeElement());
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(step.status).toBe("skipped");
    expect(step.message).toBe(
      "Cart is empty, so checkout cannot be offered (the product may not have been added)"
    );
  });

  it("skips as a test timeout when the cart page does not load in time", async () => {
    const { page, context } = createCheckHarness();
    page.gotoError = new TimeoutError("page.goto: Timeout 1000ms exceeded.");
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(step.status).toBe("skipped");
    expect(step.message).toBe(
      "Skipped (test timeout): Checkout availability: timed out; the network or the element may be slow to load"
    );
  });

  it("fails when a disabled checkout button comes with script errors from the cart page", async () => {
    const { page, context } = createCheckHarness();
    page.onGoto = () => page.emitPageError("TypeError: shipping rates undefined");
    page.register(CHECKOUT_BUTTON, new FakeElement({ enabled: false }));
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(step.status).toBe("failed");
    expect(step.issueDetails?.problem).toBe(
      "Checkout button is disabled and the cart page raised script errors"
    );
    expect(step.issueDetails?.scriptErrors).toEqual(["TypeError: shipping rates undefined"]);
  });

  it("passes a disabled checkout button with a caveat when the cart page is quiet", async () => {
    const { page, context } = createCheckHarness();
    page.register(CHECKOUT_BUTTON, new FakeElement({ enabled: false }));
    const step = startedStep("Checkout availability", 5);

    await checkCheckoutAvailability(step, context);

    expect(step.status).toBe("passed");
    expect(step.message).toBe(
      "Checkout button is visible but disabled; checkout may require other conditions (such as a shipping option)"
    );
  });
});

describe("checkCheckoutFlow", () => {
  it("reaches checkout and spots the contact form", async () => {
    const { page, context } = createCheckHarness({
      selectors: { [CHECKOUT_SELECTORS]: { email: "#email" } },
    });
    page.register(
      CHECKOUT_BUTTON,
      new FakeElement({
        onClick: () => {
          page.currentUrl = "https://shop.test/checkouts/c/abc";
        },
      })
    );
    page.register("#email", new FakeElement());
    const step = startedStep("Checkout flow", 12);

    await checkCheckoutFlow(step, context);

    expect(page.waits).toEqual([10, 20]);
    expect(step.message).toBe(
      "Reached checkout with the contact form shown: https://shop.test/checkouts/c/abc"
    );
  });

  it("passes with a caveat when the click leaves the shopper on the cart", async () => {
    const { page, context } = createCheckHarness();
    page.register(CHECKOUT_BUTTON, new FakeElement());
    const step = startedStep("Checkout flow", 12);

    await checkCheckoutFlow(step, context);

    expect(step.status).toBe("passed");
    expect(step.message).toBe(
      "Checkout clicked, but the page stayed at https://shop.test/cart; checkout may need a login or other conditions"
    );
  });

  it("fails when clicking checkout raises script errors", async () => {
    const { page, context } = createCheckHarness();
    page.register(
      CHECKOUT_BUTTON,
      new FakeElement({ onClick: () => page.emitConsole("error", "Checkout handler crashed") })
    );
    const step = startedStep("Checkout flow", 12);

    await checkCheckoutFlow(step, context);

    expect(step.status).toBe("failed");
    expect(step.issueDetails?.problem).toBe("Clicking checkout raised script errors");
    expect(step.issueDetails?.scriptErrors).toEqual(["Checkout handler crashed"]);
  });
});
