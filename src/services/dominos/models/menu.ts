/**
 * Normalized menu records
 *
 * Categories and line items point at products by code only, so every section
 * can be rebuilt on its own.
 */

export interface MenuCategory {
  readonly code: string;
  readonly name: string;
  readonly description: string;
  /** Product codes reachable under this category */
  readonly products: ReadonlySet<string>;
}

export interface MenuProduct {
  readonly code: string;
  readonly name: string;
  readonly productType: string;
  readonly description: string;
  readonly variants: ReadonlySet<string>;
}

/** One purchasable variant of a product */
export interface MenuLineItem {
  readonly code: string;
  readonly name: string;
  readonly productCode: string;
  readonly sizeCode: string;
  readonly price: number;
}

export interface MenuCoupon {
  readonly code: string;
  /** Display name, suffixed with the formatted price unless it already shows one */
  readonly name: string;
  readonly price: number | null;
}

export interface MenuCatalog {
  readonly storeId: number;
  readonly categories: readonly MenuCategory[];
  readonly products: readonly MenuProduct[];
  readonly lineItems: readonly MenuLineItem[];
  readonly coupons: readonly MenuCoupon[];
}
