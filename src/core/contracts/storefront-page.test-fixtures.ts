import { EventEmitter } from "node:events";
import type {
  ElementLocator,
  NavigationOptions,
  PageElement,
  ProbeOptions,
  StorefrontPage,
} from "./storefront-page.js";

export interface FakeElementInit {
  visible?: boolean;
  enabled?: boolean;
  visibleError?: Error;
  enabledError?: Error;
  textError?: Error;
  attributeError?: Error;
  valueError?: Error;
  text?: string | null;
  value?: string;
  attributes?: Record<string, string>;
  clickError?: Error;
  onClick?: () => void;
}

export class FakeElement implements PageElement {
  visible: boolean;
  enabled: boolean;
  text: string | null;
  value: string;
  attributes: Record<string, string>;
  clicks = 0;
  fills: string[] = [];
  readonly init: FakeElementInit;

  constructor(init: FakeElementInit = {}) {
    this.init = init;
    this.visible = init.visible ?? true;
    this.enabled = init.enabled ?? true;
    this.text = init.text === undefined ? "" : init.text;
    this.value = init.value ?? "";
    this.attributes = { ...init.attributes };
  }

  async isVisible(): Promise<boolean> {
    if (this.init.visibleError) throw this.init.visibleError;
    return this.visible;
  }

  async isEnabled(_options?: ProbeOptions): Promise<boolean> {
    if (this.init.enabledError) throw this.init.enabledError;
    return this.enabled;
  }

  async click(_options?: ProbeOptions): Promise<void> {
    if (this.init.clickError) throw this.init.clickError;
    this.clicks += 1;
    this.init.onClick?.();
  }

  async fill(value: string, _options?: ProbeOptions): Promise<void> {
    this.fills.push(value);
    this.value = value;
  }

  async textContent(_options?: ProbeOptions): Promise<string | null> {
    if (this.init.textError) throw this.init.textError;
    return this.text;
  }

  async getAttribute(name: string, _options?: ProbeOptions): Promise<string | null> {
    if (this.init.attributeError) throw this.init.attributeError;
    if (name === "value") return this.value;
    return this.attributes[name] ?? null;
  }

  async inputValue(_options?: ProbeOptions): Promise<string> {
    if (this.init.valueError) throw this.init.valueError;
    return this.value;
  }
}

const DETACHED = new FakeElement({ visible: false, enabled: false, text: null });

export class FakeLocator implements ElementLocator {
  constructor(
    readonly selector: string,
    private readonly elements: FakeElement[],
    private readonly queryError?: Error
  ) {}

  private head(): FakeElement {
    return this.elements[0] ?? DETACHED;
  }

  async count(): Promise<number> {
    if (this.queryError) throw this.queryError;
    return this.elements.length;
  }

  first(): PageElement {
    if (this.queryError) throw this.queryError;
    return this.head();
  }

  async all(): Promise<PageElement[]> {
    if (this.queryError) throw this.queryError;
    return [...this.elements];
  }

  isVisible(): Promise<boolean> {
    return this.head().isVisible();
  }

  isEnabled(options?: ProbeOptions): Promise<boolean> {
    return this.head().isEnabled(options);
  }

  click(options?: ProbeOptions): Promise<void> {
    return this.head().click(options);
  }

  fill(value: string, options?: ProbeOptions): Promise<void> {
    return this.head().fill(value, options);
  }

  textContent(options?: ProbeOptions): Promise<string | null> {
    return this.head().textContent(options);
  }

  getAttribute(name: string, options?: ProbeOptions): Promise<string | null> {
    return this.head().getAttribute(name, options);
  }

  inputValue(options?: ProbeOptions): Promise<string> {
    return this.head().inputValue(options);
  }
}

/**
 * In-process page double. Elements are registered per selector string; any
 * selector without a registration matches nothing.
 */
export class FakePage extends EventEmitter implements StorefrontPage {
  private readonly registry = new Map<string, FakeElement[]>();
  private readonly queryErrors = new Map<string, { error: Error; passing: number }>();
  private readonly queryCounts = new Map<string, number>();
  readonly locatorCalls: string[] = [];
  readonly gotoCalls: Array<{ url: string; options?: NavigationOptions }> = [];
  readonly waits: number[] = [];
  gotoError?: Error;
  currentUrl = "about:blank";
  defaultTimeout?: number;
  onGoto?: (url: string) => void;

  register(selector: string, ...elements: FakeElement[]): this {
    const existing = this.registry.get(selector) ?? [];
    this.registry.set(selector, [...existing, ...elements]);
    return this;
  }

  unregister(selector: string): this {
    this.registry.delete(selector);
    return this;
  }

  /** Queries on `selector` throw `error` once the first `passing` of them have succeeded. */
  failQuery(selector: string, error: Error, passing = 0): this {
    this.queryErrors.set(selector, { error, passing });
    return this;
  }

  locator(selector: string): FakeLocator {
    this.locatorCalls.push(selector);
    const calls = (this.queryCounts.get(selector) ?? 0) + 1;
    this.queryCounts.set(selector, calls);
    const failure = this.queryErrors.get(selector);
    return new FakeLocator(
      selector,
      this.registry.get(selector) ?? [],
      failure !== undefined && calls > failure.passing ? failure.error : undefined
    );
  }

  async goto(url: string, options?: NavigationOptions): Promise<null> {
    this.gotoCalls.push(options === undefined ? { url } : { url, options });
    if (this.gotoError) throw this.gotoError;
    this.currentUrl = url;
    this.onGoto?.(url);
    return null;
  }

  url(): string {
    return this.currentUrl;
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.waits.push(timeout);
  }

  setDefaultTimeout(timeout: number): void {
    this.defaultTimeout = timeout;
  }

  emitPageError(message: string): void {
    this.emit("pageerror", new Error(message));
  }

  emitConsole(type: string, text: string): void {
    this.emit("console", { type: () => type, text: () => text });
  }
}
