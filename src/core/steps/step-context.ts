import type { NavigationWaitCondition, StorefrontPage } from "../contracts/storefront-page.js";
import type { ElementDetector } from "../detection/element-detector.js";
import type { Product } from "../products/product.js";
import type { ScriptErrorLog } from "../run/script-error-log.js";
import type { SelectorResolver } from "../selectors/selector-resolver.js";
import type { TestStep } from "./test-step.js";

export interface StepTiming {
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  settleMs: number;
  pageSettleMs: number;
  detectWaitMs: number;
  pollIntervalMs: number;
}

/** Everything a check may touch. Built once per product run. */
export interface StepContext {
  page: StorefrontPage;
  product: Product;
  resolver: SelectorResolver;
  detector: ElementDetector;
  scriptErrors: ScriptErrorLog;
  timing: StepTiming;
  cartUrl: string;
  navigationWaitUntil: NavigationWaitCondition;
}

export type StepId =
  | "page-access"
  | "page-structure"
  | "product-info"
  | "product-title"
  | "product-price"
  | "product-images"
  | "product-description"
  | "variant-selection"
  | "quantity-selection"
  | "add-to-cart"
  | "cart-verification"
  | "related-products"
  | "checkout-availability"
  | "checkout-flow";

/**
 * Drives one started step to a terminal status. Classified problems complete
 * the step; only escalations (such as an unreachable page) are thrown.
 */
export type StepCheck = (step: TestStep, context: StepContext) => Promise<void>;

export interface StepDefinition {
  id: StepId;
  name: string;
  description: string;
  run: StepCheck;
}
