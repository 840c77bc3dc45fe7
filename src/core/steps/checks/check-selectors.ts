// Locators tried after the resolver's candidates for keys the selector
// configuration does not cover, or covers only for one theme.

export const PRODUCT_TITLE_EXTRA = ["h1.product__title", "[data-product-title]"];

export const PRODUCT_PRICE_EXTRA = [
  ".price--highlight",
  ".sale-price",
  ".sales-price",
  ".price-box .price",
  ".product-form__price-info .price",
  ".money",
];

export const PRODUCT_PRICE_META = "meta[property='product:price:amount']";

export const PRODUCT_IMAGES = [
  "img[src*='product']",
  "img[data-src*='product']",
  ".product__media-item img",
  ".product-main-image img",
  ".product-image img",
];

export const PRODUCT_DESCRIPTION = [
  ".product__description",
  ".product-description",
  "#description",
  ".product-single__description",
  "[class*='description'].rte",
];

export const RELATED_PRODUCTS = [
  "product-recommendations",
  ".product-recommendations",
  ".related-products",
  "[data-section-type='related-products']",
  "[class*='related-products']",
];

export const PAGE_STRUCTURE = {
  body: ["body"],
  header: ["header", ".header"],
  main: ["main", ".main-content"],
} as const;

export const QUANTITY_INPUT = [
  "input[name='quantity']",
  "input[type='number'][name*='quantity']",
  ".quantity-selector input",
  ".qty input",
];

export const QUANTITY_INCREASE = [
  "button.quantity-plus",
  "button[aria-label*='Increase']",
  "button:has-text('+')",
];

export const QUANTITY_DECREASE = [
  "button.quantity-minus",
  "button[aria-label*='Decrease']",
  "button:has-text('-')",
];

export const SOLD_OUT_INDICATORS = [
  'button:has-text("Sold Out")',
  'button:has-text("Out of Stock")',
  ".sold-out",
  ".out-of-stock",
];

export const CART_COUNT_EXTRA = [".cart-quantity", ".header__cart-count"];

export const CHECKOUT_BUTTON_EXTRA = [
  "button[name='checkout']",
  "[name='checkout']",
  "button:has-text('Check out')",
  "form[action*='checkout'] button",
  "#checkout",
];

export const EMPTY_CART_INDICATORS = [
  "text='Your cart is empty'",
  ".cart-empty",
  ".empty-cart",
];
