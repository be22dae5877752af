/**
 * Lookups over a normalized catalog. Categories and line items reference
 * products by code, these helpers resolve the codes.
 */

import { createComponentLogger } from '../../../lib/logger/structured-logger.js';
import type { MenuCatalog, MenuLineItem, MenuProduct } from '../models/menu.js';

const log = createComponentLogger('MenuQuery');

export interface LineItemConditions {
  code?: string;
  name?: string;
  sizeCode?: string;
  productCode?: string;
}

const SEARCH_FIELDS = ['code', 'name', 'sizeCode', 'productCode'] as const satisfies ReadonlyArray<keyof LineItemConditions>;

function indexProducts(catalog: MenuCatalog): Map<string, MenuProduct> {
  return new Map(catalog.products.map((product) => [product.code, product]));
}

function resolveProducts(codes: Iterable<string>, index: Map<string, MenuProduct>, categoryCode: string): MenuProduct[] {
  const products: MenuProduct[] = [];
  for (const code of codes) {
    const product = index.get(code);
    if (product) {
      products.push(product);
    } else {
      log.debug({ event: 'menu_product_not_found', productCode: code, categoryCode }, '[MenuQuery] Product not found');
    }
  }
  return products;
}

export function getProductsForCategory(catalog: MenuCatalog, categoryCode: string): MenuProduct[] {
  const category = catalog.categories.find((c) => c.code === categoryCode);
  if (!category) {
    return [];
  }
  return resolveProducts(category.products, indexProducts(catalog), categoryCode);
}

export function getLineItemsForProduct(catalog: MenuCatalog, productCode: string): MenuLineItem[] {
  return catalog.lineItems.filter((item) => item.productCode === productCode);
}

/**
 * Every given condition must be a case-insensitive substring of its field.
 * No conditions matches every line item.
 */
export function searchLineItems(catalog: MenuCatalog, conditions: LineItemConditions): MenuLineItem[] {
  const checks = SEARCH_FIELDS.flatMap((field) => {
    const wanted = conditions[field];
    return wanted === undefined ? [] : [{ field, wanted: wanted.toLowerCase() }];
  });

  return catalog.lineItems.filter((item) =>
    checks.every(({ field, wanted }) => item[field].toLowerCase().includes(wanted))
  );
}

/**
 * Plain-text listing: one line per category, then `  [CODE] Name` per product.
 * Categories without a resolvable product are left out.
 */
export function formatMenu(catalog: MenuCatalog): string {
  const index = indexProducts(catalog);
  const lines: string[] = [];

  for (const category of catalog.categories) {
    const products = resolveProducts(category.products, index, category.code);
    if (products.length === 0) {
      continue;
    }
    lines.push(category.name);
    for (const product of products) {
      lines.push(`  [${product.code}] ${product.name}`);
    }
  }

  return lines.join('\n');
}
