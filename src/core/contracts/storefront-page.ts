/**
 * The slice of a browser page the engine drives. Playwright's `Page` and
 * `Locator` satisfy these shapes structurally, so production code passes them
 * straight through while tests use in-process fakes.
 */

export interface ProbeOptions {
  timeout?: number;
}

export interface PageElement {
  isVisible(): Promise<boolean>;
  isEnabled(options?: ProbeOptions): Promise<boolean>;
  click(options?: ProbeOptions): Promise<void>;
  fill(value: string, options?: ProbeOptions): Promise<void>;
  textContent(options?: ProbeOptions): Promise<string | null>;
  getAttribute(name: string, options?: ProbeOptions): Promise<string | null>;
  inputValue(options?: ProbeOptions): Promise<string>;
}

export interface ElementLocator extends PageElement {
  count(): Promise<number>;
  first(): PageElement;
  all(): Promise<PageElement[]>;
}

export interface ElementQueryHost {
  locator(selector: string): ElementLocator;
}

export type NavigationWaitCondition = "load" | "domcontentloaded" | "networkidle" | "commit";

export interface NavigationOptions {
  waitUntil?: NavigationWaitCondition;
  timeout?: number;
}

export interface ConsoleEntry {
  type(): string;
  text(): string;
}

export interface ScriptErrorEmitter {
  on(event: "pageerror", listener: (error: Error) => void): unknown;
  on(event: "console", listener: (message: ConsoleEntry) => void): unknown;
  off(event: "pageerror", listener: (error: Error) => void): unknown;
  off(event: "console", listener: (message: ConsoleEntry) => void): unknown;
}

export interface StorefrontPage extends ElementQueryHost, ScriptErrorEmitter {
  goto(url: string, options?: NavigationOptions): Promise<unknown>;
  url(): string;
  waitForTimeout(timeout: number): Promise<void>;
  setDefaultTimeout(timeout: number): void;
}
