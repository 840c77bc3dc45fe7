import type { PlaywrightBrowser } from "../contracts/browser-launcher.js";

// Single source of truth for product run defaults.
export type RunMode = "quick" | "full";

export const RUN_DEFAULT_MODE: RunMode = "quick";
export const RUN_DEFAULT_BROWSER: PlaywrightBrowser = "chromium";
export const RUN_DEFAULT_HEADED = false;
export const RUN_DEFAULT_TIMEOUT_MS = 60_000;
export const RUN_DEFAULT_ACTION_TIMEOUT_MS = 3_000;
export const RUN_DEFAULT_SETTLE_MS = 1_000;
export const RUN_DEFAULT_PAGE_SETTLE_MS = 3_000;
export const RUN_DEFAULT_DETECT_WAIT_MS = 5_000;
export const RUN_DEFAULT_POLL_INTERVAL_MS = 500;
export const RUN_DEFAULT_CART_PATH = "/cart";
export const RUN_DEFAULT_CONCURRENCY = 1;
export const RUN_DEFAULT_SELECTORS_PATH = "config/selectors.json";
