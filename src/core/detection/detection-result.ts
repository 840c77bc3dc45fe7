import type { PageElement } from "../contracts/storefront-page.js";

interface DetectionAttempt {
  readonly label: string;
  readonly candidatesTried: number;
}

export interface FoundElement extends DetectionAttempt {
  readonly exists: true;
  readonly visible: boolean;
  readonly enabled: boolean;
  readonly matchedLocator: string;
  readonly element: PageElement;
  readonly error?: undefined;
}

// An absent element can be neither visible nor enabled.
export interface MissingElement extends DetectionAttempt {
  readonly exists: false;
  readonly visible: false;
  readonly enabled: false;
  readonly matchedLocator?: undefined;
  readonly element?: undefined;
  readonly error: string;
}

export type ElementDetectionResult = FoundElement | MissingElement;

export function foundElement(input: {
  label: string;
  candidatesTried: number;
  matchedLocator: string;
  element: PageElement;
  visible: boolean;
  enabled: boolean;
}): FoundElement {
  const result: FoundElement = { exists: true, ...input };
  return Object.freeze(result);
}

export function missingElement(label: string, candidatesTried: number): MissingElement {
  const result: MissingElement = {
    exists: false,
    visible: false,
    enabled: false,
    label,
    candidatesTried,
    error: `${label} not found (tried ${candidatesTried} selector${candidatesTried === 1 ? "" : "s"})`,
  };
  return Object.freeze(result);
}

export function isFunctional(result: ElementDetectionResult): result is FoundElement {
  return result.exists && result.visible && result.enabled;
}

export function describeDetection(result: ElementDetectionResult): string {
  if (!result.exists) return result.error;
  return `${result.label} via ${result.matchedLocator} (visible: ${result.visible}, enabled: ${result.enabled})`;
}
