import type { RunMode } from "../run/run-defaults.js";
import { checkCartVerification, checkCheckoutAvailability, checkCheckoutFlow } from "./checks/cart-checks.js";
import {
  checkProductDescription,
  checkProductImages,
  checkProductInfo,
  checkProductPrice,
  checkProductTitle,
  checkRelatedProducts,
} from "./checks/content-checks.js";
import {
  checkAddToCart,
  checkQuantitySelection,
  checkVariantSelection,
} from "./checks/interaction-checks.js";
import { checkPageAccess, checkPageStructure } from "./checks/page-checks.js";
import type { StepDefinition } from "./step-context.js";
import { TestStep } from "./test-step.js";

const PAGE_ACCESS: StepDefinition = {
  id: "page-access",
  name: "Page access",
  description: "Open the product page and wait for it to load",
  run: checkPageAccess,
};

const ADD_TO_CART: StepDefinition = {
  id: "add-to-cart",
  name: "Add to cart",
  description: "Click the add-to-cart button",
  run: checkAddToCart,
};

const CART_VERIFICATION: StepDefinition = {
  id: "cart-verification",
  name: "Cart verification",
  description: "Check that the cart count reflects the added product",
  run: checkCartVerification,
};

export const QUICK_STEP_PLAN: readonly StepDefinition[] = [
  PAGE_ACCESS,
  {
    id: "product-info",
    name: "Product info display",
    description: "Check that the title and price are shown",
    run: checkProductInfo,
  },
  ADD_TO_CART,
  CART_VERIFICATION,
  {
    id: "checkout-availability",
    name: "Checkout availability",
    description: "Open the cart page and check that checkout is offered",
    run: checkCheckoutAvailability,
  },
];

export const FULL_STEP_PLAN: readonly StepDefinition[] = [
  PAGE_ACCESS,
  {
    id: "page-structure",
    name: "Page structure",
    description: "Check that the page has a body, a header and a main region",
    run: checkPageStructure,
  },
  {
    id: "product-title",
    name: "Product title",
    description: "Check that the product title is shown",
    run: checkProductTitle,
  },
  {
    id: "product-price",
    name: "Product price",
    description: "Check that the product price is shown",
    run: checkProductPrice,
  },
  {
    id: "product-images",
    name: "Product images",
    description: "Check that the product images are shown",
    run: checkProductImages,
  },
  {
    id: "product-description",
    name: "Product description",
    description: "Check that the product description is shown",
    run: checkProductDescription,
  },
  {
    id: "variant-selection",
    name: "Variant selection",
    description: "Select a variant option such as a colour or size",
    run: checkVariantSelection,
  },
  {
    id: "quantity-selection",
    name: "Quantity selection",
    description: "Raise the purchase quantity",
    run: checkQuantitySelection,
  },
  ADD_TO_CART,
  CART_VERIFICATION,
  {
    id: "related-products",
    name: "Related products",
    description: "Check that related products are recommended",
    run: checkRelatedProducts,
  },
  {
    id: "checkout-flow",
    name: "Checkout flow",
    description: "Go from the cart page to checkout",
    run: checkCheckoutFlow,
  },
];

export function stepPlanFor(mode: RunMode): readonly StepDefinition[] {
  return mode === "full" ? FULL_STEP_PLAN : QUICK_STEP_PLAN;
}

export interface PlannedStep {
  step: TestStep;
  definition: StepDefinition;
}

export function createPlannedSteps(
  plan: readonly StepDefinition[],
  now: () => number = Date.now
): PlannedStep[] {
  return plan.map((definition, index) => ({
    step: new TestStep(index + 1, definition.name, definition.description, now),
    definition,
  }));
}
