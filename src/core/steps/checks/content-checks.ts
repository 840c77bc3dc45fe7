import type { ElementDetectionResult } from "../../detection/detection-result.js";
import type { StepCheck, StepContext } from "../step-context.js";
import type { IssueContext } from "../step-verdict.js";
import type { TestStep } from "../test-step.js";
import {
  PRODUCT_DESCRIPTION,
  PRODUCT_IMAGES,
  PRODUCT_PRICE_EXTRA,
  PRODUCT_PRICE_META,
  PRODUCT_TITLE_EXTRA,
  RELATED_PRODUCTS,
} from "./check-selectors.js";
import { readAttribute, readText, requireVisible, selectorCandidates } from "./check-support.js";

const PAGE_LOAD_SCENARIO = "Shopper views the product detail page";

function titleCandidates(context: StepContext): string[] {
  return selectorCandidates(context, {
    key: "product_title",
    override: context.product.selectors?.productTitle,
    extra: PRODUCT_TITLE_EXTRA,
  });
}

function priceCandidates(context: StepContext): string[] {
  return selectorCandidates(context, {
    key: "product_price",
    override: context.product.selectors?.productPrice,
    extra: PRODUCT_PRICE_EXTRA,
  });
}

async function visibleText(
  context: StepContext,
  detection: ElementDetectionResult
): Promise<string> {
  if (!detection.exists || !detection.visible) return "";
  return readText(detection.element, context.timing.actionTimeoutMs);
}

/** Themes that render the price client-side still publish it in a meta tag. */
async function metaPrice(context: StepContext): Promise<string | undefined> {
  const detection = await context.detector.detect(
    [PRODUCT_PRICE_META],
    "price metadata",
    context.timing.actionTimeoutMs
  );
  if (!detection.exists) return undefined;
  return readAttribute(detection.element, "content", context.timing.actionTimeoutMs);
}

async function countSections(context: StepContext, locator: string): Promise<number | undefined> {
  try {
    return await context.page.locator(locator).count();
  } catch {
    return undefined;
  }
}

interface VisibleContentInput {
  label: string;
  candidates: readonly string[];
  issue: IssueContext;
  /** Read the element's text and report it; an empty element passes with a caveat. */
  withText: boolean;
}

async function checkVisibleContent(
  step: TestStep,
  context: StepContext,
  input: VisibleContentInput
): Promise<void> {
  const detection = await context.detector.detect(
    input.candidates,
    input.label,
    context.timing.actionTimeoutMs
  );
  const found = requireVisible(step, context, detection, input.issue);
  if (!found) return;

  if (!input.withText) {
    step.complete("passed", `${input.label} displayed (via ${found.matchedLocator})`);
    return;
  }

  const text = await readText(found.element, context.timing.actionTimeoutMs);
  if (text.length === 0) {
    step.complete("passed", `${input.label} is visible but has no text (via ${found.matchedLocator})`);
    return;
  }
  step.complete("passed", `${input.label} displayed: ${text.slice(0, 80)}`);
}

export const checkProductInfo: StepCheck = async (step, context) => {
  const timeout = context.timing.actionTimeoutMs;
  const title = await context.detector.detect(titleCandidates(context), "Product title", timeout);
  const price = await context.detector.detect(priceCandidates(context), "Product price", timeout);

  const titleText = await visibleText(context, title);
  const priceText = (await visibleText(context, price)) || (await metaPrice(context));

  if (titleText && priceText) {
    step.complete("passed", `Title and price displayed (price: ${priceText})`);
    return;
  }
  if (titleText) {
    step.complete("passed", "Title displayed; no price was found on the page");
    return;
  }
  if (priceText) {
    step.complete("passed", `Price displayed (${priceText}); no title was found on the page`);
    return;
  }

  // Neither field is readable. Classify on the title, the anchor of the page.
  const found = requireVisible(step, context, title, {
    scenario: PAGE_LOAD_SCENARIO,
    operation: "Read the product title and price",
    problem: "Product title and price are not displayed",
  });
  if (found) {
    step.complete("passed", "Title is visible but empty, and no price was found");
  }
};

export const checkProductTitle: StepCheck = (step, context) =>
  checkVisibleContent(step, context, {
    label: "Product title",
    candidates: titleCandidates(context),
    withText: true,
    issue: {
      scenario: PAGE_LOAD_SCENARIO,
      operation: "Read the product title",
      problem: "Product title is not displayed",
    },
  });

export const checkProductPrice: StepCheck = async (step, context) => {
  const detection = await context.detector.detect(
    priceCandidates(context),
    "Product price",
    context.timing.actionTimeoutMs
  );
  const text = await visibleText(context, detection);
  if (text) {
    step.complete("passed", `Price displayed: ${text}`);
    return;
  }

  const fromMeta = await metaPrice(context);
  if (fromMeta !== undefined) {
    step.complete("passed", `Price published in page metadata: ${fromMeta}`);
    return;
  }

  const found = requireVisible(step, context, detection, {
    scenario: PAGE_LOAD_SCENARIO,
    operation: "Read the product price",
    problem: "Product price is not displayed",
  });
  if (found) {
    step.complete("passed", `Price element is visible but empty (via ${found.matchedLocator})`);
  }
};

export const checkProductImages: StepCheck = (step, context) =>
  checkVisibleContent(step, context, {
    label: "Product image",
    candidates: PRODUCT_IMAGES,
    withText: false,
    issue: {
      scenario: PAGE_LOAD_SCENARIO,
      operation: "Load the product images",
      problem: "Product image exists but is not visible",
    },
  });

export const checkProductDescription: StepCheck = (step, context) =>
  checkVisibleContent(step, context, {
    label: "Product description",
    candidates: PRODUCT_DESCRIPTION,
    withText: true,
    issue: {
      scenario: PAGE_LOAD_SCENARIO,
      operation: "Read the product description",
      problem: "Product description exists but is not visible",
    },
  });

export const checkRelatedProducts: StepCheck = async (step, context) => {
  const detection = await context.detector.detectWithWait(RELATED_PRODUCTS, "Related products", {
    maxWaitMs: context.timing.detectWaitMs,
    pollIntervalMs: context.timing.pollIntervalMs,
  });
  const found = requireVisible(step, context, detection, {
    scenario: PAGE_LOAD_SCENARIO,
    operation: "Load the related products section",
    problem: "Related products section exists but is not visible",
  });
  if (!found) return;

  const sections = await countSections(context, found.matchedLocator);
  if (sections === undefined) {
    step.complete("passed", `Related products shown (via ${found.matchedLocator})`);
    return;
  }
  step.complete(
    "passed",
    `Related products shown (${sections} section${sections === 1 ? "" : "s"} via ${found.matchedLocator})`
  );
};
