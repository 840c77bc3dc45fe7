import type { ProductBatchResult } from "../../core/run/product-batch.js";
import type { ProductRunResult } from "../../core/run/product-runner.js";
import type { TestStepRecord } from "../../core/steps/test-step.js";

export function formatStepTally(result: ProductRunResult): string {
  const { passed, failed, skipped, pending } = result.summary;
  const parts = [`${passed} passed`, `${failed} failed`, `${skipped} skipped`];
  if (pending > 0) parts.push(`${pending} not run`);
  return parts.join(", ");
}

/** One block of lines per failed step, ready for triage. */
export function formatIssueLines(step: TestStepRecord): string[] {
  const issue = step.issueDetails;
  if (!issue) return [];
  const lines = [
    `[Step ${step.number}] ${step.name}: ${issue.problem}`,
    `  Scenario:   ${issue.scenario}`,
    `  Operation:  ${issue.operation}`,
    `  Root cause: ${issue.rootCause}`,
  ];
  for (const scriptError of issue.scriptErrors) {
    lines.push(`  Script error: ${scriptError}`);
  }
  return lines;
}

export function buildStepRows(result: ProductRunResult): string[][] {
  return [
    ["#", "Step", "Status", "Message"],
    ...result.steps.map((step) => [
      String(step.number),
      step.name,
      step.status,
      step.message,
    ]),
  ];
}

export function formatBatchSummary(batch: ProductBatchResult): string {
  const total = batch.results.length;
  return `${batch.failed} failed, ${batch.passed} passed out of ${total} product${total === 1 ? "" : "s"} (${batch.durationMs}ms)`;
}
