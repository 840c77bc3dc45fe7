import { SelectorResolver } from "../../core/selectors/selector-resolver.js";
import { BASE_SELECTORS } from "../../core/selectors/selector-defaults.js";
import { RUN_DEFAULT_SELECTORS_PATH } from "../../core/run/run-defaults.js";
import { loadConfig } from "../../utils/config.js";
import { ui } from "../../utils/ui.js";

export interface SelectorsCliOptions {
  type?: string;
  selectors?: string;
}

export interface SetSelectorCliOptions extends SelectorsCliOptions {
  /** `true` saves to the loaded file; a string saves to that path. */
  save?: boolean | string;
}

async function loadResolver(opts: SelectorsCliOptions): Promise<SelectorResolver> {
  const config = await loadConfig();
  return SelectorResolver.load(opts.selectors ?? config.selectorsPath ?? RUN_DEFAULT_SELECTORS_PATH);
}

/** Rows of namespace, key and the candidates `resolve` would hand the detector. */
export function buildSelectorRows(resolver: SelectorResolver, selectorType?: string): string[][] {
  const types = selectorType === undefined ? resolver.getSelectorTypes() : [selectorType];
  const rows: string[][] = [["Namespace", "Key", "Candidates"]];
  for (const type of types) {
    for (const key of Object.keys(resolver.getAll(type))) {
      rows.push([type, key, resolver.resolve(key, type).join(" | ")]);
    }
  }
  return rows;
}

export async function listSelectors(opts: SelectorsCliOptions): Promise<void> {
  const resolver = await loadResolver(opts);
  ui.heading(`Selectors (${resolver.source === "file" ? resolver.configPath : "built-in defaults"})`);
  const rows = buildSelectorRows(resolver, opts.type);
  if (rows.length === 1) {
    ui.warn(opts.type === undefined ? "No selector namespaces configured" : `No selectors in ${opts.type}`);
    return;
  }
  ui.table(rows);
}

export async function setSelector(
  key: string,
  value: string,
  opts: SetSelectorCliOptions
): Promise<void> {
  const resolver = await loadResolver(opts);
  const selectorType = opts.type ?? BASE_SELECTORS;
  resolver.update(key, value, selectorType);
  ui.step(`Resolves to: ${resolver.resolve(key, selectorType, { fallback: false }).join(" | ")}`);

  if (opts.save === undefined || opts.save === false) {
    ui.dim("Not saved. Pass --save to write the change to the selector file.");
    return;
  }
  await resolver.persist(typeof opts.save === "string" ? opts.save : undefined);
}
