import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage } from "../../utils/errors.js";
import { ui } from "../../utils/ui.js";
import type { ElementQueryHost } from "../contracts/storefront-page.js";
import {
  RUN_DEFAULT_ACTION_TIMEOUT_MS,
  RUN_DEFAULT_DETECT_WAIT_MS,
  RUN_DEFAULT_POLL_INTERVAL_MS,
} from "../run/run-defaults.js";
import {
  describeDetection,
  foundElement,
  missingElement,
  type ElementDetectionResult,
} from "./detection-result.js";

export interface ElementDetectorOptions {
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => number;
}

export interface DetectWaitOptions {
  maxWaitMs?: number;
  pollIntervalMs?: number;
}

async function probe(
  check: () => Promise<boolean>,
  onFailure: boolean
): Promise<boolean> {
  try {
    return await check();
  } catch {
    return onFailure;
  }
}

/**
 * Finds the first locator candidate that matches in the live document.
 *
 * Absence is an ordinary outcome: `detect` never throws for a missing element
 * or a broken candidate.
 */
export class ElementDetector {
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => number;

  constructor(
    private readonly host: ElementQueryHost,
    options: ElementDetectorOptions = {}
  ) {
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.now = options.now ?? Date.now;
  }

  async detect(
    candidates: readonly string[],
    label: string,
    timeout: number = RUN_DEFAULT_ACTION_TIMEOUT_MS
  ): Promise<ElementDetectionResult> {
    for (const [index, candidate] of candidates.entries()) {
      try {
        const locator = this.host.locator(candidate);
        const count = await locator.count();
        if (count === 0) continue;

        const element = locator.first();
        // Visibility defaults to hidden when the probe fails; enablement to
        // enabled, since most non-form elements have no disabled state.
        const visible = await probe(() => element.isVisible(), false);
        const enabled = await probe(() => element.isEnabled({ timeout }), true);

        const result = foundElement({
          label,
          candidatesTried: index + 1,
          matchedLocator: candidate,
          element,
          visible,
          enabled,
        });
        ui.debug(`Found ${describeDetection(result)}`);
        return result;
      } catch (err) {
        ui.debug(`Selector '${candidate}' failed: ${errorMessage(err)}`);
      }
    }

    const missing = missingElement(label, candidates.length);
    ui.debug(describeDetection(missing));
    return missing;
  }

  async detectWithWait(
    candidates: readonly string[],
    label: string,
    options: DetectWaitOptions = {}
  ): Promise<ElementDetectionResult> {
    const maxWaitMs = options.maxWaitMs ?? RUN_DEFAULT_DETECT_WAIT_MS;
    const pollIntervalMs = options.pollIntervalMs ?? RUN_DEFAULT_POLL_INTERVAL_MS;
    const deadline = this.now() + maxWaitMs;

    while (this.now() < deadline) {
      const result = await this.detect(candidates, label, pollIntervalMs);
      if (result.exists) return result;
      await this.sleep(pollIntervalMs);
    }

    // One last look after the deadline so a late render is not reported absent.
    const finalResult = await this.detect(candidates, label);
    if (!finalResult.exists) {
      ui.debug(`Waited ${maxWaitMs}ms for ${label}; treating it as absent`);
    }
    return finalResult;
  }
}
