import { describe, expect, it } from "vitest";
import { formatRunProfileSummary } from "./profile-summary.js";
import { resolveRunProfile } from "./run-profile.js";

describe("profile summary formatting", () => {
  it("formats the run summary", () => {
    const out = formatRunProfileSummary(
      resolveRunProfile({ mode: "full", headed: true, timeout: "10000", concurrency: "2" })
    );

    expect(out).toBe(
      "Run profile: mode=full, browser=chromium, headed=yes, timeout=10000ms, concurrency=2, selectors=config/selectors.json"
    );
  });
});
