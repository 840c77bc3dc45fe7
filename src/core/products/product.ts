import { z } from "zod";
import { ValidationError } from "../../utils/errors.js";

const productSelectorsSchema = z
  .object({
    productTitle: z.string().min(1).optional(),
    productPrice: z.string().min(1).optional(),
    addToCartButton: z.string().min(1).optional(),
    variantOptions: z.record(z.string().min(1)).optional(),
  })
  .strict();

export const productSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  url: z.string().url(),
  selectors: productSelectorsSchema.optional(),
});

export type ProductSelectors = z.infer<typeof productSelectorsSchema>;
export type Product = z.infer<typeof productSchema>;

/** Last non-empty path segment, or the host for a bare storefront URL. */
export function productIdFromUrl(url: string): string {
  const parsed = new URL(url);
  const segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);
  return segments.at(-1) ?? parsed.hostname;
}

export function parseProduct(raw: unknown, source = "product"): Product {
  const parsed = productSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || source}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function productFromUrl(
  url: string,
  overrides: { name?: string; selectors?: ProductSelectors } = {}
): Product {
  let id: string;
  try {
    id = productIdFromUrl(url);
  } catch {
    throw new ValidationError(`Invalid product URL: ${url}`, [
      "url: expected an absolute http(s) URL",
    ]);
  }
  return parseProduct(
    {
      id,
      name: overrides.name ?? id,
      url,
      ...(overrides.selectors === undefined ? {} : { selectors: overrides.selectors }),
    },
    `product URL ${url}`
  );
}
