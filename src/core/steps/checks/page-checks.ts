import { errorMessage } from "../../../utils/errors.js";
import { classifyFailure } from "../../classification/failure-classifier.js";
import { PageAccessError } from "../step-errors.js";
import { completeWithClassification } from "../step-verdict.js";
import type { StepCheck } from "../step-context.js";
import { PAGE_STRUCTURE } from "./check-selectors.js";
import { settle } from "./check-support.js";

export const checkPageAccess: StepCheck = async (step, context) => {
  const { page, product, timing } = context;
  try {
    await page.goto(product.url, {
      waitUntil: context.navigationWaitUntil,
      timeout: timing.navigationTimeoutMs,
    });
    await settle(context, timing.pageSettleMs);
  } catch (err) {
    const classification = classifyFailure({
      stepName: step.name,
      operation: `open ${product.url}`,
      scriptErrors: context.scriptErrors.all(),
      exception: err,
    });
    completeWithClassification(
      step,
      classification,
      {
        scenario: "Shopper opens the product page",
        operation: `Navigate to ${product.url}`,
        problem: "Product page did not load",
      },
      errorMessage(err)
    );
    throw new PageAccessError(product.url, classification, err);
  }

  step.complete("passed", `Page loaded: ${page.url()}`);
};

export const checkPageStructure: StepCheck = async (step, context) => {
  const { detector, timing } = context;
  const missing: string[] = [];
  for (const [region, candidates] of Object.entries(PAGE_STRUCTURE)) {
    const detection = await detector.detect(candidates, region, timing.actionTimeoutMs);
    if (!detection.exists) missing.push(region);
  }

  if (missing.length === 0) {
    step.complete("passed", "Page structure is complete (body, header and main present)");
    return;
  }
  step.complete(
    "passed",
    `Page loaded, but the structure is incomplete (missing: ${missing.join(", ")})`
  );
};
