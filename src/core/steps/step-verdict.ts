import {
  FAILURE_KIND_LABELS,
  shouldReportAsFailed,
  type FailureClassification,
} from "../classification/failure-classification.js";
import type { TestStep } from "./test-step.js";

/** How a defect reads to whoever triages it. */
export interface IssueContext {
  scenario: string;
  operation: string;
  problem: string;
  rootCause?: string;
}

/**
 * Settles a running step from a classification: a website bug fails the step
 * with issue details; every other kind skips it with the classifier's reason.
 */
export function completeWithClassification(
  step: TestStep,
  classification: FailureClassification,
  issue: IssueContext,
  error?: string
): void {
  const completion = error === undefined ? {} : { error };

  if (shouldReportAsFailed(classification)) {
    step.complete("failed", `${issue.problem}: ${classification.reason}`, {
      ...completion,
      issueDetails: {
        scenario: issue.scenario,
        operation: issue.operation,
        problem: issue.problem,
        rootCause: issue.rootCause ?? classification.reason,
        scriptErrors: [...classification.evidence.scriptErrors],
        classification,
      },
    });
    return;
  }

  step.complete(
    "skipped",
    `Skipped (${FAILURE_KIND_LABELS[classification.kind]}): ${classification.reason}`,
    { ...completion, classification }
  );
}
