import type { ResolvedRunProfile } from "./run-profile.js";

export function formatRunProfileSummary(profile: ResolvedRunProfile): string {
  return `Run profile: mode=${profile.mode}, browser=${profile.browser}, headed=${profile.headed ? "yes" : "no"}, timeout=${profile.timeout}ms, concurrency=${profile.concurrency}, selectors=${profile.selectorsPath}`;
}
