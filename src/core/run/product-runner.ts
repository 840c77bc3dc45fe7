import { browserNotInstalledError, isLikelyMissingBrowser } from "../../utils/browser-runtime.js";
import { errorMessage } from "../../utils/errors.js";
import { ui } from "../../utils/ui.js";
import { classifyFailure } from "../classification/failure-classifier.js";
import type {
  BrowserLaunchers,
  PlaywrightBrowser,
  ProductBrowser,
  ProductBrowserContext,
} from "../contracts/browser-launcher.js";
import { ElementDetector, type ElementDetectorOptions } from "../detection/element-detector.js";
import type { Product } from "../products/product.js";
import type { SelectorResolver } from "../selectors/selector-resolver.js";
import type { StepContext, StepTiming } from "../steps/step-context.js";
import { createPlannedSteps, stepPlanFor, type PlannedStep } from "../steps/step-plans.js";
import { completeWithClassification } from "../steps/step-verdict.js";
import type { TestStepRecord } from "../steps/test-step.js";
import {
  RUN_DEFAULT_ACTION_TIMEOUT_MS,
  RUN_DEFAULT_BROWSER,
  RUN_DEFAULT_CART_PATH,
  RUN_DEFAULT_DETECT_WAIT_MS,
  RUN_DEFAULT_HEADED,
  RUN_DEFAULT_MODE,
  RUN_DEFAULT_PAGE_SETTLE_MS,
  RUN_DEFAULT_POLL_INTERVAL_MS,
  RUN_DEFAULT_SETTLE_MS,
  RUN_DEFAULT_TIMEOUT_MS,
  type RunMode,
} from "./run-defaults.js";
import { ScriptErrorLog } from "./script-error-log.js";

export interface ProductRunOptions {
  mode?: RunMode;
  headed?: boolean;
  browser?: PlaywrightBrowser;
  timeout?: number;
  actionTimeoutMs?: number;
  settleMs?: number;
  pageSettleMs?: number;
  detectWaitMs?: number;
  pollIntervalMs?: number;
  cartPath?: string;
}

export interface ProductRunDependencies {
  browserLaunchers: BrowserLaunchers;
  detector?: ElementDetectorOptions;
  now?: () => number;
}

export type ProductRunStatus = "passed" | "failed";

export interface StepTally {
  passed: number;
  failed: number;
  skipped: number;
  pending: number;
}

export interface ProductRunResult {
  productId: string;
  productName: string;
  url: string;
  mode: RunMode;
  status: ProductRunStatus;
  steps: TestStepRecord[];
  summary: StepTally;
  /** Exceptions that aborted the run rather than settling a single step. */
  errors: string[];
  startedAt: string;
  durationMs: number;
}

function resolveTiming(options: ProductRunOptions): StepTiming {
  return {
    navigationTimeoutMs: options.timeout ?? RUN_DEFAULT_TIMEOUT_MS,
    actionTimeoutMs: options.actionTimeoutMs ?? RUN_DEFAULT_ACTION_TIMEOUT_MS,
    settleMs: options.settleMs ?? RUN_DEFAULT_SETTLE_MS,
    pageSettleMs: options.pageSettleMs ?? RUN_DEFAULT_PAGE_SETTLE_MS,
    detectWaitMs: options.detectWaitMs ?? RUN_DEFAULT_DETECT_WAIT_MS,
    pollIntervalMs: options.pollIntervalMs ?? RUN_DEFAULT_POLL_INTERVAL_MS,
  };
}

export function cartUrlFor(productUrl: string, cartPath: string = RUN_DEFAULT_CART_PATH): string {
  return new URL(cartPath, productUrl).toString();
}

export function tallySteps(steps: readonly TestStepRecord[]): StepTally {
  const tally: StepTally = { passed: 0, failed: 0, skipped: 0, pending: 0 };
  for (const step of steps) {
    if (step.status === "running") continue;
    tally[step.status] += 1;
  }
  return tally;
}

/**
 * Runs the planned steps in order. A check that throws aborts the sequence:
 * its step is settled from the exception, and the exception propagates.
 */
export async function runStepSequence(
  planned: readonly PlannedStep[],
  context: StepContext
): Promise<void> {
  for (const { step, definition } of planned) {
    step.start();
    try {
      await definition.run(step, context);
    } catch (err) {
      if (!step.isSettled) {
        const classification = classifyFailure({
          stepName: step.name,
          scriptErrors: context.scriptErrors.all(),
          exception: err,
        });
        completeWithClassification(
          step,
          classification,
          {
            scenario: definition.description,
            operation: definition.name,
            problem: `${definition.name} could not finish`,
          },
          errorMessage(err)
        );
      }
      throw err;
    }

    if (!step.isSettled) {
      step.complete("skipped", `${definition.name} did not report an outcome`);
    }
  }
}

async function launchBrowser(
  headed: boolean,
  browserName: PlaywrightBrowser,
  launchers: BrowserLaunchers
): Promise<ProductBrowser> {
  const spinner = ui.spinner(`Launching ${browserName}...`).start();
  try {
    const browser = await launchers[browserName].launch({ headless: !headed });
    spinner.stop();
    return browser;
  } catch (err) {
    spinner.fail(`Could not launch ${browserName}`);
    if (isLikelyMissingBrowser(errorMessage(err))) {
      throw browserNotInstalledError(browserName);
    }
    throw err;
  }
}

/** Closes the context, then the browser. Returns what could not be closed. */
async function releaseBrowser(
  browser: ProductBrowser | undefined,
  context: ProductBrowserContext | undefined
): Promise<string[]> {
  const failures: string[] = [];
  const resources: Array<[string, { close(): Promise<void> } | undefined]> = [
    ["browser context", context],
    ["browser", browser],
  ];
  for (const [label, resource] of resources) {
    try {
      await resource?.close();
    } catch (err) {
      failures.push(`Could not close the ${label}: ${errorMessage(err)}`);
    }
  }
  return failures;
}

export async function runProductTest(
  product: Product,
  resolver: SelectorResolver,
  options: ProductRunOptions,
  dependencies: ProductRunDependencies
): Promise<ProductRunResult> {
  const now = dependencies.now ?? Date.now;
  const mode = options.mode ?? RUN_DEFAULT_MODE;
  const timing = resolveTiming(options);
  const planned = createPlannedSteps(stepPlanFor(mode), now);
  const scriptErrors = new ScriptErrorLog();
  const errors: string[] = [];
  const runStart = now();

  ui.heading(`${product.name} (${mode} run, ${planned.length} steps)`);
  ui.dim(product.url);

  let browser: ProductBrowser | undefined;
  let browserContext: ProductBrowserContext | undefined;
  let aborted = false;

  try {
    browser = await launchBrowser(
      options.headed ?? RUN_DEFAULT_HEADED,
      options.browser ?? RUN_DEFAULT_BROWSER,
      dependencies.browserLaunchers
    );
    browserContext = await browser.newContext();
    const page = await browserContext.newPage();
    page.setDefaultTimeout(timing.navigationTimeoutMs);
    scriptErrors.attach(page);

    await runStepSequence(planned, {
      page,
      product,
      resolver,
      detector: new ElementDetector(page, dependencies.detector),
      scriptErrors,
      timing,
      cartUrl: cartUrlFor(product.url, options.cartPath),
      navigationWaitUntil: mode === "full" ? "load" : "domcontentloaded",
    });
  } catch (err) {
    ui.error(`Run aborted for ${product.name}: ${errorMessage(err)}`);
    errors.push(errorMessage(err));
    aborted = true;
  } finally {
    scriptErrors.dispose();
    // Release failures are recorded but leave the run status alone.
    for (const failure of await releaseBrowser(browser, browserContext)) {
      ui.warn(failure);
      errors.push(failure);
    }
  }

  const steps = planned.map(({ step }) => step.toRecord());
  const summary = tallySteps(steps);
  const status: ProductRunStatus =
    aborted || summary.failed > 0 ? "failed" : "passed";

  return {
    productId: product.id,
    productName: product.name,
    url: product.url,
    mode,
    status,
    steps,
    summary,
    errors,
    startedAt: new Date(runStart).toISOString(),
    durationMs: Math.max(0, now() - runStart),
  };
}
