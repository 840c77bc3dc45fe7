import type { SelectorConfigDocument } from "./selector-config.js";

export const BASE_SELECTORS = "base_selectors";
export const VARIANT_SELECTORS = "variant_selectors";
export const CHECKOUT_SELECTORS = "checkout_selectors";

/** Used when no selector configuration file exists. Generic storefront theme markup. */
export const DEFAULT_SELECTOR_CONFIG: SelectorConfigDocument = {
  version: "1.0",
  platform: "shopify",
  [BASE_SELECTORS]: {
    product_title: ".product-title, h1.product__title",
    product_price: ".product-price, .price",
    add_to_cart_button: "button[name='add'], button:has-text('Add to Cart')",
    cart_count: ".cart-count, .cart-item-count, [data-cart-count]",
    cart_drawer: ".cart-drawer, #CartDrawer",
    checkout_button: "button:has-text('Checkout'), a[href*='checkout']",
  },
  [VARIANT_SELECTORS]: {
    color: '.color-swatch, [data-option="Color"] button',
    size: '.size-option, [data-option="Size"] button',
  },
  [CHECKOUT_SELECTORS]: {
    email: '#email, input[name="email"]',
    first_name: '#firstName, input[name="firstName"]',
    last_name: '#lastName, input[name="lastName"]',
    address: '#address1, input[name="address1"]',
    city: '#city, input[name="city"]',
    postal_code: '#zip, input[name="postalCode"]',
    country: '#country, select[name="countryCode"]',
  },
};

/**
 * Last-resort locators for well-known logical keys, independent of namespace.
 */
export const FALLBACK_SELECTORS: Readonly<Record<string, string>> = {
  product_title: 'h1, .title, [class*="product-title"], [class*="product_title"]',
  product_price: '.price, [class*="price"], [data-price]',
  add_to_cart_button: 'button:has-text("Add"), button:has-text("加入"), button[name="add"]',
  cart_count: '[class*="cart-count"], [class*="cart_count"], [data-cart-count]',
  cart_drawer: '[class*="cart-drawer"], [class*="cart_drawer"], #cart-drawer',
  checkout_button: 'button:has-text("Checkout"), button:has-text("结账"), a[href*="checkout"]',
  color: '[data-option="Color"] button, [data-option="color"] button, .color-swatch',
  size: '[data-option="Size"] button, [data-option="size"] button, .size-option',
  email: 'input[type="email"], input[name*="email"]',
  first_name: 'input[name*="first"], input[name*="firstName"]',
  last_name: 'input[name*="last"], input[name*="lastName"]',
  address: 'input[name*="address"]',
  city: 'input[name*="city"]',
  postal_code: 'input[name*="postal"], input[name*="zip"]',
  country: 'select[name*="country"]',
};
