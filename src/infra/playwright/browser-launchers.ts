import { chromium, firefox, webkit } from "playwright";
import type { BrowserLaunchers } from "../../core/contracts/browser-launcher.js";

export const PLAYWRIGHT_BROWSER_LAUNCHERS: BrowserLaunchers = {
  chromium,
  firefox,
  webkit,
};
