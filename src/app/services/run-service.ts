import { productFromUrl, type Product } from "../../core/products/product.js";
import { runProductBatch, type ProductBatchDependencies } from "../../core/run/product-batch.js";
import { SelectorResolver } from "../../core/selectors/selector-resolver.js";
import { PLAYWRIGHT_BROWSER_LAUNCHERS } from "../../infra/playwright/browser-launchers.js";
import { loadConfig } from "../../utils/config.js";
import { UserError } from "../../utils/errors.js";
import { ui } from "../../utils/ui.js";
import { formatRunProfileSummary } from "../options/profile-summary.js";
import { resolveRunProfile, type RunProfileInput } from "../options/run-profile.js";
import {
  buildStepRows,
  formatBatchSummary,
  formatIssueLines,
  formatStepTally,
} from "./run-reporting.js";

export interface RunCliOptions extends RunProfileInput {
  name?: string;
}

export function buildProducts(urls: readonly string[], name?: string): Product[] {
  if (urls.length === 0) {
    throw new UserError("No product URLs given", "Pass one or more product page URLs: storefront-qa run <url...>");
  }
  if (name !== undefined && urls.length > 1) {
    throw new UserError("--name applies to a single product URL", "Drop --name or run one URL at a time.");
  }
  return urls.map((url) => productFromUrl(url, name === undefined ? {} : { name }));
}

export async function runStorefrontQa(
  urls: readonly string[],
  opts: RunCliOptions,
  dependencies: Partial<ProductBatchDependencies> = {}
): Promise<void> {
  const config = await loadConfig();
  const profile = resolveRunProfile(opts, config);
  const products = buildProducts(urls, opts.name);
  const resolver = await SelectorResolver.load(profile.selectorsPath);

  ui.info(formatRunProfileSummary(profile));
  ui.heading(`Testing ${products.length} product${products.length === 1 ? "" : "s"}...`);
  console.log();

  const batch = await runProductBatch(
    products,
    resolver,
    {
      mode: profile.mode,
      headed: profile.headed,
      browser: profile.browser,
      timeout: profile.timeout,
      settleMs: profile.settleMs,
      detectWaitMs: profile.detectWaitMs,
      pollIntervalMs: profile.pollIntervalMs,
      cartPath: profile.cartPath,
      concurrency: profile.concurrency,
    },
    { browserLaunchers: PLAYWRIGHT_BROWSER_LAUNCHERS, ...dependencies }
  );

  console.log();
  ui.heading("Results");
  for (const result of batch.results) {
    const line = `${result.productName}: ${formatStepTally(result)} (${result.durationMs}ms)`;
    if (result.status === "passed") {
      ui.success(line);
    } else {
      ui.error(line);
    }
    ui.table(buildStepRows(result));
    for (const step of result.steps) {
      for (const issueLine of formatIssueLines(step)) ui.step(issueLine);
    }
    for (const error of result.errors) ui.dim(`  Run error: ${error}`);
    console.log();
  }

  if (batch.failed === 0) {
    ui.success(formatBatchSummary(batch));
  } else {
    ui.error(formatBatchSummary(batch));
    process.exitCode = 1;
  }
}
