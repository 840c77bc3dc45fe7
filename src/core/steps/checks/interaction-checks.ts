import { VARIANT_SELECTORS } from "../../selectors/selector-defaults.js";
import { isFunctional, type FoundElement } from "../../detection/detection-result.js";
import type { PageElement } from "../../contracts/storefront-page.js";
import type { StepCheck, StepContext } from "../step-context.js";
import type { IssueContext } from "../step-verdict.js";
import type { TestStep } from "../test-step.js";
import {
  QUANTITY_DECREASE,
  QUANTITY_INCREASE,
  QUANTITY_INPUT,
  SOLD_OUT_INDICATORS,
} from "./check-selectors.js";
import {
  classifyAndComplete,
  interact,
  isInteractable,
  readAttribute,
  readText,
  requirePresent,
  requireVisible,
  selectorCandidates,
} from "./check-support.js";

const DEFAULT_VARIANT_OPTIONS = ["color", "size"];

function variantOptionKeys(context: StepContext): string[] {
  const keys = new Set<string>([
    ...Object.keys(context.product.selectors?.variantOptions ?? {}),
    ...Object.keys(context.resolver.getAll(VARIANT_SELECTORS)),
  ]);
  return keys.size > 0 ? [...keys] : DEFAULT_VARIANT_OPTIONS;
}

export const checkVariantSelection: StepCheck = async (step, context) => {
  const { timing } = context;
  const candidates = variantOptionKeys(context).flatMap((key) =>
    selectorCandidates(context, {
      key,
      selectorType: VARIANT_SELECTORS,
      override: context.product.selectors?.variantOptions?.[key],
    })
  );
  const issue: IssueContext = {
    scenario: "Shopper picks a product variant",
    operation: "Select a variant option",
    problem: "Variant options cannot be used",
  };

  const detection = await context.detector.detect(candidates, "Variant options", timing.actionTimeoutMs);
  const found = requireVisible(step, context, detection, issue);
  if (!found) return;

  let options: PageElement[];
  try {
    options = await context.page.locator(found.matchedLocator).all();
  } catch (err) {
    classifyAndComplete(
      step,
      {
        detection: found,
        operation: `list variant options via ${found.matchedLocator}`,
        scriptErrors: [],
        exception: err,
      },
      issue
    );
    return;
  }

  // The first option is usually preselected; prefer switching to another one.
  let target: PageElement | undefined;
  for (const option of [...options.slice(1), ...options.slice(0, 1)]) {
    if (await isInteractable(option, timing.actionTimeoutMs)) {
      target = option;
      break;
    }
  }
  if (!target) {
    step.complete("passed", "Variant options are shown, but none can be selected right now");
    return;
  }

  const selected = target;
  const operation = `click variant option via ${found.matchedLocator}`;
  const errors = await interact(step, context, {
    detection: found,
    operation,
    issue,
    action: () => selected.click({ timeout: timing.actionTimeoutMs }),
  });
  if (!errors) return;
  if (errors.length > 0) {
    classifyAndComplete(step, { detection: found, operation, scriptErrors: errors }, {
      ...issue,
      problem: "Selecting a variant raised script errors",
    });
    return;
  }

  const label = await readText(selected, timing.actionTimeoutMs);
  step.complete("passed", label ? `Selected variant option '${label}'` : "Selected a variant option");
};

async function readQuantity(element: PageElement, timeout: number): Promise<number> {
  let raw: string | undefined;
  try {
    raw = await element.inputValue({ timeout });
  } catch {
    raw = await readAttribute(element, "value", timeout);
  }
  return Number.parseInt(raw ?? "", 10);
}

async function checkQuantityIncrease(
  step: TestStep,
  context: StepContext,
  quantity: FoundElement,
  increase: FoundElement
): Promise<void> {
  const timeout = context.timing.actionTimeoutMs;
  const before = await readQuantity(quantity.element, timeout);
  const operation = "click the quantity increase button";
  const issue: IssueContext = {
    scenario: "Shopper adjusts the purchase quantity on the product page",
    operation: `Click the increase button, expecting the quantity to rise from ${before}`,
    problem: "Quantity did not change and the page raised script errors",
    rootCause: "The quantity update logic failed on the page",
  };

  const errors = await interact(step, context, {
    detection: increase,
    operation,
    issue,
    action: () => increase.element.click({ timeout }),
  });
  if (!errors) return;

  const after = await readQuantity(quantity.element, timeout);
  if (after > before) {
    step.complete("passed", `Quantity increased (${before} → ${after})`);
    return;
  }
  if (errors.length > 0) {
    classifyAndComplete(step, { detection: increase, operation, scriptErrors: errors }, issue);
    return;
  }
  step.complete(
    "passed",
    `Quantity unchanged (${Number.isNaN(after) ? "unreadable" : after}); the product may have a purchase limit`
  );
}

export const checkQuantitySelection: StepCheck = async (step, context) => {
  const { detector, timing } = context;
  const quantity = await detector.detect(QUANTITY_INPUT, "Quantity selector", timing.actionTimeoutMs);
  const increase = await detector.detect(QUANTITY_INCREASE, "Quantity increase button", timing.actionTimeoutMs);
  const decrease = await detector.detect(QUANTITY_DECREASE, "Quantity decrease button", timing.actionTimeoutMs);

  if (!requirePresent(step, context, quantity)) return;

  if (increase.exists || decrease.exists) {
    if (isFunctional(increase)) {
      await checkQuantityIncrease(step, context, quantity, increase);
      return;
    }
    step.complete("passed", "Quantity buttons are present but disabled; other purchase conditions may apply");
    return;
  }

  const visible = requireVisible(step, context, quantity, {
    scenario: "Shopper adjusts the purchase quantity on the product page",
    operation: "Locate the quantity selector",
    problem: "Quantity selector exists but is not visible",
  });
  if (!visible) return;
  if (quantity.enabled) {
    const current = await readQuantity(quantity.element, timing.actionTimeoutMs);
    step.complete(
      "passed",
      `Quantity input accepts manual entry (current value: ${Number.isNaN(current) ? "empty" : current})`
    );
    return;
  }
  step.complete("passed", "Quantity input is present but not editable");
};

export const checkAddToCart: StepCheck = async (step, context) => {
  const { detector, timing } = context;
  const issue: IssueContext = {
    scenario: "Shopper adds the product to the cart",
    operation: "Click the add-to-cart button",
    problem: "Add to cart did not work",
  };
  const candidates = selectorCandidates(context, {
    key: "add_to_cart_button",
    override: context.product.selectors?.addToCartButton,
  });

  const detection = await detector.detect(candidates, "Add-to-cart button", timing.actionTimeoutMs);
  const found = requireVisible(step, context, detection, issue);
  if (!found) return;

  if (!found.enabled) {
    const soldOut = await detector.detect(SOLD_OUT_INDICATORS, "Sold-out marker", timing.actionTimeoutMs);
    step.complete(
      "passed",
      soldOut.exists
        ? "Add-to-cart button is disabled; the product is sold out"
        : "Add-to-cart button is visible but disabled; a variant selection may be required"
    );
    return;
  }

  const operation = "click add-to-cart";
  const errors = await interact(step, context, {
    detection: found,
    operation,
    issue,
    action: () => found.element.click({ timeout: timing.actionTimeoutMs }),
    // Cart drawers animate in after the click.
    settleMs: timing.settleMs * 2,
  });
  if (!errors) return;
  if (errors.length > 0) {
    classifyAndComplete(step, { detection: found, operation, scriptErrors: errors }, {
      ...issue,
      problem: "Adding to cart raised script errors",
    });
    return;
  }
  step.complete("passed", `Clicked add-to-cart (via ${found.matchedLocator})`);
};
