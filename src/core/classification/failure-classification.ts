export type FailureKind =
  | "website_bug"
  | "missing_feature"
  | "test_timeout"
  | "network_error"
  | "test_error";

export type ClassificationRuleId =
  | "element-missing"
  | "hidden-with-script-errors"
  | "hidden-by-design"
  | "visible-with-script-errors"
  | "timeout-exception"
  | "network-exception"
  | "other-exception"
  | "unknown";

export interface DetectionEvidence {
  elementExists: boolean;
  elementVisible: boolean;
  elementEnabled: boolean;
  candidatesTried: number;
  matchedLocator?: string;
}

export interface ExceptionEvidence {
  exception: string;
  exceptionType: string;
}

interface ClassificationBase<K extends FailureKind, E> {
  readonly kind: K;
  readonly rule: ClassificationRuleId;
  readonly reason: string;
  readonly evidence: E;
}

export type WebsiteBugClassification = ClassificationBase<
  "website_bug",
  {
    detection: DetectionEvidence;
    scriptErrors: string[];
    operation?: string;
  }
>;

export type MissingFeatureClassification = ClassificationBase<
  "missing_feature",
  { detection: DetectionEvidence }
>;

export type TestTimeoutClassification = ClassificationBase<"test_timeout", ExceptionEvidence>;

export type NetworkErrorClassification = ClassificationBase<"network_error", ExceptionEvidence>;

export type TestErrorClassification = ClassificationBase<
  "test_error",
  { exception?: ExceptionEvidence; operation?: string }
>;

export type FailureClassification =
  | WebsiteBugClassification
  | MissingFeatureClassification
  | TestTimeoutClassification
  | NetworkErrorClassification
  | TestErrorClassification;

export function isWebsiteBug(
  classification: FailureClassification
): classification is WebsiteBugClassification {
  return classification.kind === "website_bug";
}

/** Only a website bug is a reportable failure; every other kind is a skip or a soft pass. */
export function shouldReportAsFailed(
  classification: FailureClassification
): classification is WebsiteBugClassification {
  return isWebsiteBug(classification);
}

export const FAILURE_KIND_LABELS: Record<FailureKind, string> = {
  website_bug: "website bug",
  missing_feature: "missing feature",
  test_timeout: "test timeout",
  network_error: "network error",
  test_error: "test error",
};
