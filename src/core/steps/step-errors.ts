import { UserError } from "../../utils/errors.js";
import type { FailureClassification } from "../classification/failure-classification.js";

export class StepStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StepStateError";
  }
}

/**
 * Raised when the product page cannot be opened. Every later step depends on
 * the page, so the run stops here.
 */
export class PageAccessError extends UserError {
  constructor(
    readonly url: string,
    readonly classification: FailureClassification,
    readonly reason: unknown
  ) {
    super(
      `Could not open product page ${url}: ${classification.reason}`,
      "Check that the URL is reachable, or raise --timeout for slow storefronts."
    );
    this.name = "PageAccessError";
  }
}
