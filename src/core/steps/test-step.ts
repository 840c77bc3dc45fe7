import { ui } from "../../utils/ui.js";
import type {
  FailureClassification,
  FailureKind,
  WebsiteBugClassification,
} from "../classification/failure-classification.js";
import { StepStateError } from "./step-errors.js";

export type StepStatus = "pending" | "running" | "passed" | "failed" | "skipped";

export type StepOutcome = Extract<StepStatus, "passed" | "failed" | "skipped">;

/** What a reportable defect looks like: always backed by a website-bug verdict. */
export interface IssueDetails {
  scenario: string;
  operation: string;
  problem: string;
  rootCause: string;
  scriptErrors: string[];
  classification: WebsiteBugClassification;
}

export interface StepCompletion {
  error?: string;
  issueDetails?: IssueDetails;
  classification?: FailureClassification;
}

export interface TestStepRecord {
  number: number;
  name: string;
  description: string;
  status: StepStatus;
  message: string;
  error?: string;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  classification?: FailureKind;
  issueDetails?: IssueDetails;
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * One numbered check in a product run.
 *
 * pending → running → passed | failed | skipped. `start` and `complete` each
 * happen once, and a failed outcome must carry the defect that caused it.
 */
export class TestStep {
  private currentStatus: StepStatus = "pending";
  private outcomeMessage = "";
  private outcomeError: string | undefined;
  private startTime: number | undefined;
  private endTime: number | undefined;
  private issue: IssueDetails | undefined;
  private verdict: FailureClassification | undefined;

  constructor(
    readonly number: number,
    readonly name: string,
    readonly description: string,
    private readonly now: () => number = Date.now
  ) {}

  get status(): StepStatus {
    return this.currentStatus;
  }

  get message(): string {
    return this.outcomeMessage;
  }

  get error(): string | undefined {
    return this.outcomeError;
  }

  get issueDetails(): IssueDetails | undefined {
    return this.issue;
  }

  get classification(): FailureClassification | undefined {
    return this.verdict;
  }

  get startedAt(): number | undefined {
    return this.startTime;
  }

  get completedAt(): number | undefined {
    return this.endTime;
  }

  get durationMs(): number | undefined {
    if (this.startTime === undefined || this.endTime === undefined) return undefined;
    return this.endTime - this.startTime;
  }

  get isSettled(): boolean {
    return this.currentStatus !== "pending" && this.currentStatus !== "running";
  }

  start(): void {
    if (this.currentStatus !== "pending") {
      throw new StepStateError(
        `Step ${this.number} (${this.name}) cannot start from status '${this.currentStatus}'`
      );
    }
    this.currentStatus = "running";
    this.startTime = this.now();

    ui.info(`[Step ${this.number}] ${this.name}`);
    ui.dim(`  ${this.description}`);
  }

  complete(status: StepOutcome, message: string, completion: StepCompletion = {}): void {
    if (this.currentStatus !== "running") {
      throw new StepStateError(
        `Step ${this.number} (${this.name}) cannot complete from status '${this.currentStatus}'`
      );
    }
    if (completion.issueDetails !== undefined && status !== "failed") {
      throw new StepStateError(
        `Step ${this.number} (${this.name}) attached issue details to a '${status}' outcome`
      );
    }
    if (status === "failed" && completion.issueDetails === undefined) {
      throw new StepStateError(
        `Step ${this.number} (${this.name}) failed without issue details`
      );
    }

    const startTime = this.startTime ?? this.now();
    this.currentStatus = status;
    this.outcomeMessage = message;
    this.outcomeError = completion.error;
    this.issue = completion.issueDetails;
    this.verdict = completion.issueDetails?.classification ?? completion.classification;
    // A clock that steps backwards still yields a non-negative duration.
    this.endTime = Math.max(this.now(), startTime);

    const elapsed = formatSeconds(this.endTime - startTime);
    if (status === "passed") {
      ui.success(`${message} (${elapsed})`);
    } else if (status === "failed") {
      ui.error(`${message} (${elapsed})`);
      if (completion.error) ui.dim(`  ${completion.error}`);
    } else {
      ui.skip(`${message} (${elapsed})`);
    }
  }

  toRecord(): TestStepRecord {
    const record: TestStepRecord = {
      number: this.number,
      name: this.name,
      description: this.description,
      status: this.currentStatus,
      message: this.outcomeMessage,
    };
    if (this.outcomeError !== undefined) record.error = this.outcomeError;
    if (this.startTime !== undefined) record.startedAt = new Date(this.startTime).toISOString();
    if (this.endTime !== undefined) record.completedAt = new Date(this.endTime).toISOString();
    const durationMs = this.durationMs;
    if (durationMs !== undefined) record.durationMs = durationMs;
    if (this.verdict !== undefined) record.classification = this.verdict.kind;
    if (this.issue !== undefined) record.issueDetails = structuredClone(this.issue);
    return record;
  }
}
