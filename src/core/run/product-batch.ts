import type { Product } from "../products/product.js";
import type { SelectorResolver } from "../selectors/selector-resolver.js";
import {
  runProductTest,
  type ProductRunDependencies,
  type ProductRunOptions,
  type ProductRunResult,
} from "./product-runner.js";
import { RUN_DEFAULT_CONCURRENCY } from "./run-defaults.js";

export interface ProductBatchOptions extends ProductRunOptions {
  concurrency?: number;
}

export interface ProductBatchDependencies extends ProductRunDependencies {
  runProduct?: typeof runProductTest;
}

export interface ProductBatchResult {
  results: ProductRunResult[];
  passed: number;
  failed: number;
  durationMs: number;
}

/**
 * Runs products through a bounded pool of workers. Each run launches and
 * releases its own browser; results keep the input order.
 */
export async function runProductBatch(
  products: readonly Product[],
  resolver: SelectorResolver,
  options: ProductBatchOptions,
  dependencies: ProductBatchDependencies
): Promise<ProductBatchResult> {
  const now = dependencies.now ?? Date.now;
  const runProduct = dependencies.runProduct ?? runProductTest;
  const { concurrency = RUN_DEFAULT_CONCURRENCY, ...runOptions } = options;
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), products.length));
  const batchStart = now();

  const slots: Array<ProductRunResult | undefined> = products.map(() => undefined);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < products.length) {
      const index = nextIndex;
      nextIndex += 1;
      const product = products[index];
      if (product === undefined) return;
      slots[index] = await runProduct(product, resolver, runOptions, dependencies);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const results = slots.filter((result): result is ProductRunResult => result !== undefined);
  const failed = results.filter((result) => result.status === "failed").length;
  return {
    results,
    passed: results.length - failed,
    failed,
    durationMs: Math.max(0, now() - batchStart),
  };
}
