const OPENERS: Record<string, string> = { "(": ")", "[": "]" };

/**
 * Split a comma-joined locator list into trimmed candidates, preserving order.
 * Commas nested in quotes, parentheses or attribute brackets stay inside
 * their candidate, so `button:has-text('Add, now')` is a single entry.
 */
export function splitSelectorList(value: string): string[] {
  const candidates: string[] = [];
  const closers: string[] = [];
  let quote: "'" | '"' | undefined;
  let escaped = false;
  let current = "";

  for (const ch of value) {
    if (quote) {
      current += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      current += ch;
      continue;
    }

    const closer = OPENERS[ch];
    if (closer) {
      closers.push(closer);
    } else if (closers.length > 0 && ch === closers[closers.length - 1]) {
      closers.pop();
    } else if (ch === "," && closers.length === 0) {
      candidates.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  candidates.push(current);

  return candidates.map((candidate) => candidate.trim()).filter((candidate) => candidate.length > 0);
}

export function toCandidateList(value: string | readonly string[]): string[] {
  const entries = typeof value === "string" ? [value] : value;
  return entries.flatMap((entry) => splitSelectorList(entry));
}

export function dedupeCandidates(candidates: readonly string[]): string[] {
  return [...new Set(candidates)];
}
