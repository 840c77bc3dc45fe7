import type { StorefrontPage } from "./storefront-page.js";

export type PlaywrightBrowser = "chromium" | "firefox" | "webkit";

export interface LaunchOptions {
  headless?: boolean;
  timeout?: number;
}

export interface ProductBrowserContext {
  newPage(): Promise<StorefrontPage>;
  close(): Promise<void>;
}

export interface ProductBrowser {
  newContext(): Promise<ProductBrowserContext>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options?: LaunchOptions): Promise<ProductBrowser>;
}

export type BrowserLaunchers = Record<PlaywrightBrowser, BrowserLauncher>;
