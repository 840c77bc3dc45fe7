import { errorMessage } from "../../../utils/errors.js";
import { FAILURE_KIND_LABELS } from "../../classification/failure-classification.js";
import {
  classifyFailure,
  shouldSkipStep,
  type ClassificationInput,
} from "../../classification/failure-classifier.js";
import type { PageElement } from "../../contracts/storefront-page.js";
import type { ElementDetectionResult, FoundElement } from "../../detection/detection-result.js";
import { BASE_SELECTORS } from "../../selectors/selector-defaults.js";
import { dedupeCandidates, splitSelectorList } from "../../selectors/selector-list.js";
import type { StepContext } from "../step-context.js";
import { completeWithClassification, type IssueContext } from "../step-verdict.js";
import type { TestStep } from "../test-step.js";

export interface CandidateSource {
  key?: string;
  selectorType?: string;
  /** Product-specific locator list, tried first. */
  override?: string | undefined;
  extra?: readonly string[];
}

/** Product override, then configured and fallback candidates, then check-specific extras. */
export function selectorCandidates(context: StepContext, source: CandidateSource): string[] {
  const fromOverride = source.override === undefined ? [] : splitSelectorList(source.override);
  const fromResolver =
    source.key === undefined
      ? []
      : context.resolver.resolve(source.key, source.selectorType ?? BASE_SELECTORS, {
          appendFallbacks: true,
        });
  return dedupeCandidates([...fromOverride, ...fromResolver, ...(source.extra ?? [])]);
}

export function settle(context: StepContext, ms = context.timing.settleMs): Promise<void> {
  return context.page.waitForTimeout(ms);
}

/** Trimmed text content; an element whose text cannot be read counts as empty. */
export async function readText(element: PageElement, timeout: number): Promise<string> {
  try {
    return (await element.textContent({ timeout }))?.trim() ?? "";
  } catch {
    return "";
  }
}

/** Trimmed attribute value; absent, empty or unreadable gives `undefined`. */
export async function readAttribute(
  element: PageElement,
  name: string,
  timeout: number
): Promise<string | undefined> {
  try {
    const value = (await element.getAttribute(name, { timeout }))?.trim();
    return value ? value : undefined;
  } catch {
    return undefined;
  }
}

/** Visible and enabled; a probe that throws counts as not interactable. */
export async function isInteractable(element: PageElement, timeout: number): Promise<boolean> {
  try {
    return (await element.isVisible()) && (await element.isEnabled({ timeout }));
  } catch {
    return false;
  }
}

export function classifyAndComplete(
  step: TestStep,
  input: Omit<ClassificationInput, "stepName">,
  issue: IssueContext
): void {
  const classification = classifyFailure({ stepName: step.name, ...input });
  const error = input.exception === undefined ? undefined : errorMessage(input.exception);
  completeWithClassification(step, classification, issue, error);
}

/**
 * Settles the step when the element is absent or hidden. Returns the found
 * element when it is visible and the check should carry on.
 */
export function requireVisible(
  step: TestStep,
  context: StepContext,
  detection: ElementDetectionResult,
  issue: IssueContext
): FoundElement | undefined {
  if (detection.exists && detection.visible) return detection;
  classifyAndComplete(
    step,
    { detection, scriptErrors: context.scriptErrors.all() },
    issue
  );
  return undefined;
}

/**
 * Skips the step when the element or any other prerequisite is not on the
 * page, naming every absent one. Returns whether the element was found.
 */
export function requirePresent(
  step: TestStep,
  context: StepContext,
  detection: ElementDetectionResult,
  others: readonly ElementDetectionResult[] = []
): detection is FoundElement {
  const prerequisites = [detection, ...others];
  const decision = shouldSkipStep(step.name, prerequisites);
  if (!decision.skip) return detection.exists;

  const absent = prerequisites.find((result) => !result.exists) ?? detection;
  const classification = classifyFailure({
    stepName: step.name,
    detection: absent,
    scriptErrors: context.scriptErrors.all(),
  });
  step.complete(
    "skipped",
    `Skipped (${FAILURE_KIND_LABELS[classification.kind]}): ${decision.reason ?? classification.reason}`,
    { classification }
  );
  return false;
}

export interface InteractionInput {
  detection: FoundElement;
  operation: string;
  issue: IssueContext;
  action: () => Promise<void>;
  settleMs?: number;
}

/**
 * Runs an interaction and the settle pause after it. Returns the script
 * errors raised during that window, or `undefined` when the interaction threw
 * and the step has already been settled from the exception.
 */
export async function interact(
  step: TestStep,
  context: StepContext,
  input: InteractionInput
): Promise<string[] | undefined> {
  const mark = context.scriptErrors.mark();
  try {
    await input.action();
    await settle(context, input.settleMs);
  } catch (err) {
    classifyAndComplete(
      step,
      {
        detection: input.detection,
        operation: input.operation,
        scriptErrors: context.scriptErrors.since(mark),
        exception: err,
      },
      input.issue
    );
    return undefined;
  }
  return context.scriptErrors.since(mark);
}
