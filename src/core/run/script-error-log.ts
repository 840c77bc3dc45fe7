import type { ConsoleEntry, ScriptErrorEmitter } from "../contracts/storefront-page.js";

/** Position in the log; errors recorded after it belong to the window. */
export type ScriptErrorMark = number;

/**
 * Collects uncaught page exceptions and console errors for the lifetime of a
 * page. Steps take a mark before an interaction and read what arrived since.
 */
export class ScriptErrorLog {
  private readonly entries: string[] = [];
  private detach: (() => void) | undefined;

  attach(emitter: ScriptErrorEmitter): this {
    this.dispose();

    const onPageError = (error: Error) => this.record(error.message);
    const onConsole = (message: ConsoleEntry) => {
      if (message.type() === "error") this.record(message.text());
    };

    emitter.on("pageerror", onPageError);
    emitter.on("console", onConsole);
    this.detach = () => {
      emitter.off("pageerror", onPageError);
      emitter.off("console", onConsole);
    };
    return this;
  }

  record(message: string): void {
    this.entries.push(message);
  }

  mark(): ScriptErrorMark {
    return this.entries.length;
  }

  since(mark: ScriptErrorMark): string[] {
    return this.entries.slice(mark);
  }

  all(): string[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  dispose(): void {
    this.detach?.();
    this.detach = undefined;
  }
}
