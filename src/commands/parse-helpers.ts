import { UserError } from "../utils/errors.js";

/** Commander hands options over as a plain object; read it as unknown values. */
export function asOptionRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object") return {};
  return Object.fromEntries(Object.entries(value));
}

export function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asOptionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function asOptionalFlagOrString(value: unknown): boolean | string | undefined {
  return typeof value === "boolean" || typeof value === "string" ? value : undefined;
}

export function parseStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

export function parseRequiredArgument(value: unknown, name: string): string {
  if (typeof value === "string" && value.length > 0) return value;
  throw new UserError(`Missing required argument: ${name}`);
}
