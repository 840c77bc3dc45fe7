import { UserError } from "./errors.js";

export function isLikelyMissingBrowser(message: string): boolean {
  const normalized = message.toLowerCase();
  return (
    normalized.includes("executable doesn't exist") ||
    normalized.includes("browsertype.launch") ||
    normalized.includes("please run the following command to download new browsers") ||
    normalized.includes("playwright install")
  );
}

export function browserNotInstalledError(browserName: string): UserError {
  return new UserError(
    `${browserName} browser is not installed.`,
    `Run: npx playwright install ${browserName}`
  );
}
