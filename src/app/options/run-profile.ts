import type { PlaywrightBrowser } from "../../core/contracts/browser-launcher.js";
import {
  RUN_DEFAULT_BROWSER,
  RUN_DEFAULT_CART_PATH,
  RUN_DEFAULT_CONCURRENCY,
  RUN_DEFAULT_DETECT_WAIT_MS,
  RUN_DEFAULT_HEADED,
  RUN_DEFAULT_MODE,
  RUN_DEFAULT_POLL_INTERVAL_MS,
  RUN_DEFAULT_SELECTORS_PATH,
  RUN_DEFAULT_SETTLE_MS,
  RUN_DEFAULT_TIMEOUT_MS,
  type RunMode,
} from "../../core/run/run-defaults.js";
import type { StorefrontQaConfig } from "../../utils/config.js";
import { UserError } from "../../utils/errors.js";

export interface RunProfileInput {
  mode?: string;
  headed?: boolean;
  timeout?: string;
  concurrency?: string;
  selectors?: string;
  browser?: string;
}

export interface ResolvedRunProfile {
  mode: RunMode;
  headed: boolean;
  browser: PlaywrightBrowser;
  timeout: number;
  settleMs: number;
  detectWaitMs: number;
  pollIntervalMs: number;
  cartPath: string;
  concurrency: number;
  selectorsPath: string;
}

const RUN_MODES: readonly RunMode[] = ["quick", "full"];
const BROWSERS: readonly PlaywrightBrowser[] = ["chromium", "firefox", "webkit"];

/** CLI flags win over the config file; the config file wins over defaults. */
export function resolveRunProfile(
  input: RunProfileInput,
  config: StorefrontQaConfig = {}
): ResolvedRunProfile {
  const mode =
    input.mode !== undefined ? parseRunMode(input.mode) : config.mode ?? RUN_DEFAULT_MODE;
  const browser =
    input.browser !== undefined
      ? parseBrowser(input.browser)
      : config.browser ?? RUN_DEFAULT_BROWSER;

  const timeout =
    input.timeout !== undefined
      ? parsePositiveInt(
          input.timeout,
          "timeout",
          "Use a positive integer in milliseconds, for example: --timeout 30000"
        )
      : config.timeout ?? RUN_DEFAULT_TIMEOUT_MS;

  const concurrency =
    input.concurrency !== undefined
      ? parsePositiveInt(
          input.concurrency,
          "concurrency",
          "Use a positive integer, for example: --concurrency 3"
        )
      : config.concurrency ?? RUN_DEFAULT_CONCURRENCY;

  const selectorsPath = (input.selectors ?? config.selectorsPath ?? RUN_DEFAULT_SELECTORS_PATH).trim();
  if (!selectorsPath) {
    throw new UserError(
      "Invalid selectors path value: empty path",
      "Set a non-empty path with --selectors <path>."
    );
  }

  const cartPath = config.cartPath ?? RUN_DEFAULT_CART_PATH;
  if (!cartPath.startsWith("/")) {
    throw new UserError(
      `Invalid cartPath value in config: ${cartPath}`,
      "cartPath must be a site-relative path such as /cart."
    );
  }

  return {
    mode,
    headed: input.headed ?? config.headed ?? RUN_DEFAULT_HEADED,
    browser,
    timeout,
    settleMs: config.settleMs ?? RUN_DEFAULT_SETTLE_MS,
    detectWaitMs: config.detectWaitMs ?? RUN_DEFAULT_DETECT_WAIT_MS,
    pollIntervalMs: config.pollIntervalMs ?? RUN_DEFAULT_POLL_INTERVAL_MS,
    cartPath,
    concurrency,
    selectorsPath,
  };
}

function parseRunMode(input: string): RunMode {
  const mode = RUN_MODES.find((candidate) => candidate === input);
  if (!mode) {
    throw new UserError(`Invalid mode value: ${input}`, "Use --mode quick or --mode full.");
  }
  return mode;
}

function parseBrowser(input: string): PlaywrightBrowser {
  const browser = BROWSERS.find((candidate) => candidate === input);
  if (!browser) {
    throw new UserError(
      `Invalid browser value: ${input}`,
      `Use one of: ${BROWSERS.join(", ")}.`
    );
  }
  return browser;
}

function parsePositiveInt(input: string, label: string, hint: string): number {
  const value = Number(input);
  if (!Number.isFinite(value) || value <= 0 || !Number.isInteger(value)) {
    throw new UserError(`Invalid ${label} value from CLI flag --${label}: ${input}`, hint);
  }
  return value;
}
