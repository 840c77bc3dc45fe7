import { FakePage } from "../../contracts/storefront-page.test-fixtures.js";
import { ElementDetector } from "../../detection/element-detector.js";
import type { Product } from "../../products/product.js";
import { ScriptErrorLog } from "../../run/script-error-log.js";
import type { SelectorConfigDocument } from "../../selectors/selector-config.js";
import { SelectorResolver } from "../../selectors/selector-resolver.js";
import type { StepContext, StepTiming } from "../step-context.js";
import { TestStep } from "../test-step.js";

export const TEST_TIMING: StepTiming = {
  navigationTimeoutMs: 1_000,
  actionTimeoutMs: 100,
  settleMs: 10,
  pageSettleMs: 20,
  detectWaitMs: 200,
  pollIntervalMs: 100,
};

export const TEST_PRODUCT: Product = {
  id: "trail-bike",
  name: "Trail Bike",
  url: "https://shop.test/products/trail-bike",
};

export interface CheckContextInit {
  page?: FakePage;
  selectors?: SelectorConfigDocument;
  product?: Partial<Product>;
}

export interface CheckHarness {
  page: FakePage;
  context: StepContext;
}

/**
 * A step context over a fake page. The resolver has no fallback table, so
 * the candidates a check tries are exactly the configured ones plus its own.
 */
export function createCheckHarness(init: CheckContextInit = {}): CheckHarness {
  const page = init.page ?? new FakePage();
  let clock = 0;
  const context: StepContext = {
    page,
    product: { ...TEST_PRODUCT, ...init.product },
    resolver: new SelectorResolver(init.selectors ?? {}, { fallbacks: {} }),
    detector: new ElementDetector(page, {
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    }),
    scriptErrors: new ScriptErrorLog().attach(page),
    timing: TEST_TIMING,
    cartUrl: "https://shop.test/cart",
    navigationWaitUntil: "domcontentloaded",
  };
  return { page, context };
}

export function startedStep(name: string, number = 1): TestStep {
  const step = new TestStep(number, name, `${name} check`);
  step.start();
  return step;
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}
