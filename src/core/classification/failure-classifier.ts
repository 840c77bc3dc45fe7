import type { ElementDetectionResult } from "../detection/detection-result.js";
import type {
  ClassificationRuleId,
  DetectionEvidence,
  ExceptionEvidence,
  FailureClassification,
  TestErrorClassification,
  WebsiteBugClassification,
} from "./failure-classification.js";

export interface ClassificationInput {
  stepName: string;
  detection?: ElementDetectionResult;
  operation?: string;
  scriptErrors: readonly string[];
  exception?: unknown;
}

export interface ClassificationRule {
  id: ClassificationRuleId;
  /** Returns a classification when the rule applies, otherwise undefined. */
  evaluate(input: ClassificationInput): FailureClassification | undefined;
}

const NETWORK_FAULT_MARKERS = ["net::", "connection", "network"];

export function exceptionText(exception: unknown): string {
  return exception instanceof Error ? exception.message : String(exception);
}

export function exceptionEvidence(exception: unknown): ExceptionEvidence {
  return {
    exception: exceptionText(exception),
    exceptionType: exception instanceof Error ? exception.name : typeof exception,
  };
}

export function isTimeoutException(exception: unknown): boolean {
  if (exception instanceof Error && exception.name.includes("Timeout")) return true;
  return exceptionText(exception).toLowerCase().includes("timeout");
}

export function isNetworkException(exception: unknown): boolean {
  const text = exceptionText(exception).toLowerCase();
  return NETWORK_FAULT_MARKERS.some((marker) => text.includes(marker));
}

export function detectionEvidence(detection: ElementDetectionResult): DetectionEvidence {
  const evidence: DetectionEvidence = {
    elementExists: detection.exists,
    elementVisible: detection.visible,
    elementEnabled: detection.enabled,
    candidatesTried: detection.candidatesTried,
  };
  if (detection.matchedLocator !== undefined) {
    evidence.matchedLocator = detection.matchedLocator;
  }
  return evidence;
}

function websiteBugEvidence(
  detection: ElementDetectionResult,
  scriptErrors: readonly string[],
  operation: string | undefined
): WebsiteBugClassification["evidence"] {
  const evidence: WebsiteBugClassification["evidence"] = {
    detection: detectionEvidence(detection),
    scriptErrors: [...scriptErrors],
  };
  if (operation !== undefined) evidence.operation = operation;
  return evidence;
}

function testErrorEvidence(
  exception: unknown,
  operation: string | undefined
): TestErrorClassification["evidence"] {
  const evidence: TestErrorClassification["evidence"] = {};
  if (exception !== undefined) evidence.exception = exceptionEvidence(exception);
  if (operation !== undefined) evidence.operation = operation;
  return evidence;
}

/**
 * Ordered decision table. The first rule that returns a classification wins;
 * rows are listed in precedence order.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    id: "element-missing",
    evaluate: ({ stepName, detection }) => {
      if (!detection || detection.exists) return undefined;
      return {
        kind: "missing_feature",
        rule: "element-missing",
        reason: `${stepName}: the required UI element is not on the page; the feature is probably not offered`,
        evidence: { detection: detectionEvidence(detection) },
      };
    },
  },
  {
    id: "hidden-with-script-errors",
    evaluate: ({ stepName, detection, operation, scriptErrors }) => {
      if (!detection?.exists || detection.visible || scriptErrors.length === 0) return undefined;
      return {
        kind: "website_bug",
        rule: "hidden-with-script-errors",
        reason: `${stepName}: the UI element exists but is hidden, and the page raised script errors`,
        evidence: websiteBugEvidence(detection, scriptErrors, operation),
      };
    },
  },
  {
    id: "hidden-by-design",
    evaluate: ({ stepName, detection }) => {
      if (!detection?.exists || detection.visible) return undefined;
      return {
        kind: "missing_feature",
        rule: "hidden-by-design",
        reason: `${stepName}: the UI element exists but is hidden, likely lazy-loaded or hidden by design`,
        evidence: { detection: detectionEvidence(detection) },
      };
    },
  },
  {
    id: "visible-with-script-errors",
    evaluate: ({ stepName, detection, operation, scriptErrors }) => {
      if (!detection?.exists || !detection.visible || scriptErrors.length === 0) return undefined;
      return {
        kind: "website_bug",
        rule: "visible-with-script-errors",
        reason: `${stepName}: the UI element is present but the interaction triggered script errors`,
        evidence: websiteBugEvidence(detection, scriptErrors, operation),
      };
    },
  },
  {
    id: "timeout-exception",
    evaluate: ({ stepName, exception }) => {
      if (exception === undefined || !isTimeoutException(exception)) return undefined;
      return {
        kind: "test_timeout",
        rule: "timeout-exception",
        reason: `${stepName}: timed out; the network or the element may be slow to load`,
        evidence: exceptionEvidence(exception),
      };
    },
  },
  {
    id: "network-exception",
    evaluate: ({ stepName, exception }) => {
      if (exception === undefined || !isNetworkException(exception)) return undefined;
      return {
        kind: "network_error",
        rule: "network-exception",
        reason: `${stepName}: hit a network error`,
        evidence: exceptionEvidence(exception),
      };
    },
  },
  {
    id: "other-exception",
    evaluate: ({ stepName, exception, operation }) => {
      if (exception === undefined) return undefined;
      return {
        kind: "test_error",
        rule: "other-exception",
        reason: `${stepName}: the test logic raised an error`,
        evidence: testErrorEvidence(exception, operation),
      };
    },
  },
];

export function classifyFailure(input: ClassificationInput): FailureClassification {
  for (const rule of CLASSIFICATION_RULES) {
    const classification = rule.evaluate(input);
    if (classification) return classification;
  }

  return {
    kind: "test_error",
    rule: "unknown",
    reason: `${input.stepName}: failed for an unknown reason`,
    evidence: testErrorEvidence(undefined, input.operation),
  };
}

export interface SkipDecision {
  skip: boolean;
  reason?: string;
}

export function shouldSkipStep(
  stepName: string,
  prerequisites: readonly ElementDetectionResult[]
): SkipDecision {
  const missing = prerequisites.filter((result) => !result.exists);
  if (missing.length === 0) return { skip: false };

  return {
    skip: true,
    reason: `${stepName}: required UI elements are not on the page (${missing
      .map((result) => result.label)
      .join(", ")}); skipping`,
  };
}
