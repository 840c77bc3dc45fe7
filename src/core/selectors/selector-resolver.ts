import { ui } from "../../utils/ui.js";
import { RUN_DEFAULT_SELECTORS_PATH } from "../run/run-defaults.js";
import {
  readSelectorConfig,
  writeSelectorConfig,
  type SelectorConfigDocument,
  type SelectorConfigSource,
  type SelectorNamespace,
  type SelectorValue,
} from "./selector-config.js";
import {
  BASE_SELECTORS,
  DEFAULT_SELECTOR_CONFIG,
  FALLBACK_SELECTORS,
} from "./selector-defaults.js";
import { dedupeCandidates, splitSelectorList, toCandidateList } from "./selector-list.js";

export interface ResolveOptions {
  /** Consult the built-in fallback table. Defaults to true. */
  fallback?: boolean;
  /**
   * Append fallback candidates after configured ones instead of using them
   * only when nothing is configured.
   */
  appendFallbacks?: boolean;
}

export interface SelectorResolverOptions {
  configPath?: string;
  source?: SelectorConfigSource;
  fallbacks?: Readonly<Record<string, string>>;
}

function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Maps logical element keys to ordered locator candidates.
 *
 * One instance is shared read-only across concurrent product runs. `update`
 * is unsynchronized and belongs to setup, before runs start.
 */
export class SelectorResolver {
  readonly configPath: string;
  readonly source: SelectorConfigSource;
  private readonly metadata: Record<string, string> = {};
  private readonly namespaces: Record<string, SelectorNamespace> = {};
  private readonly fallbacks: Readonly<Record<string, string>>;

  constructor(document: SelectorConfigDocument, options: SelectorResolverOptions = {}) {
    this.configPath = options.configPath ?? RUN_DEFAULT_SELECTORS_PATH;
    this.source = options.source ?? "file";
    this.fallbacks = options.fallbacks ?? FALLBACK_SELECTORS;

    for (const [name, entry] of Object.entries(structuredClone(document))) {
      if (typeof entry === "string") {
        this.metadata[name] = entry;
      } else {
        this.namespaces[name] = entry;
      }
    }
  }

  static async load(configPath: string = RUN_DEFAULT_SELECTORS_PATH): Promise<SelectorResolver> {
    const document = await readSelectorConfig(configPath);
    if (document === undefined) {
      ui.warn(`Selector config not found: ${configPath}, using defaults`);
      return new SelectorResolver(DEFAULT_SELECTOR_CONFIG, { configPath, source: "defaults" });
    }
    const base = document[BASE_SELECTORS];
    const baseCount = typeof base === "object" ? Object.keys(base).length : 0;
    ui.debug(`Loaded selector config ${configPath}: ${baseCount} base selectors`);
    return new SelectorResolver(document, { configPath, source: "file" });
  }

  resolve(
    key: string,
    selectorType: string = BASE_SELECTORS,
    options: ResolveOptions = {}
  ): string[] {
    const namespace = ownEntry(this.namespaces, selectorType);
    const configured = namespace ? ownEntry(namespace, key) : undefined;
    const candidates = configured === undefined ? [] : toCandidateList(configured);

    if (options.fallback === false) return candidates;
    if (candidates.length > 0 && !options.appendFallbacks) return candidates;

    const fallback = ownEntry(this.fallbacks, key);
    if (fallback === undefined) return candidates;

    if (candidates.length === 0) {
      ui.debug(`Using fallback selector for '${key}': ${fallback}`);
    }
    return dedupeCandidates([...candidates, ...splitSelectorList(fallback)]);
  }

  update(key: string, value: SelectorValue, selectorType: string = BASE_SELECTORS): void {
    const namespace = ownEntry(this.namespaces, selectorType) ?? {};
    namespace[key] = value;
    this.namespaces[selectorType] = namespace;
    ui.info(`Updated selector: ${selectorType}.${key} = ${String(value)}`);
  }

  async persist(outputPath?: string): Promise<string> {
    const targetPath = outputPath ?? this.configPath;
    await writeSelectorConfig(this.toDocument(), targetPath);
    ui.success(`Saved selector config to ${targetPath}`);
    return targetPath;
  }

  getAll(selectorType: string = BASE_SELECTORS): Readonly<SelectorNamespace> {
    return { ...ownEntry(this.namespaces, selectorType) };
  }

  getSelectorTypes(): string[] {
    return Object.keys(this.namespaces).filter((name) => name.endsWith("_selectors"));
  }

  toDocument(): SelectorConfigDocument {
    return structuredClone({ ...this.metadata, ...this.namespaces });
  }
}
