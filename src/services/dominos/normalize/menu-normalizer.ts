/**
 * Menu Normalizer
 *
 * Builds a MenuCatalog from a raw structured-menu document. Four independent
 * passes (categories, products, line items, coupons); a failed pass leaves its
 * section empty and does not affect the others.
 *
 * Record-level malformation follows the ParsePolicy:
 * - abort-pass (default): the first bad record empties the whole section
 * - skip-record: the bad record is dropped, the pass continues
 */

import { createComponentLogger } from '../../../lib/logger/structured-logger.js';
import type { ParsePolicy } from '../config/dominos.config.js';
import type { MenuCatalog, MenuCategory, MenuCoupon, MenuLineItem, MenuProduct } from '../models/menu.js';
import type { Store } from '../models/store.js';
import {
  categoriesSectionSchema,
  couponSchema,
  productSchema,
  recordSectionSchema,
  variantSchema,
} from '../schemas/menu.schema.js';
import { validateRecord, type ParseResult } from '../schemas/validate.js';
import { flattenCategory } from './category-flattener.js';

const log = createComponentLogger('MenuNormalizer');

export type MenuSection = 'categories' | 'products' | 'lineItems' | 'coupons';

export interface SectionReport {
  status: 'ok' | 'aborted' | 'empty';
  parsed: number;
  skipped: number;
}

export interface NormalizeOptions {
  policy?: ParsePolicy;
}

export interface NormalizedMenu {
  catalog: MenuCatalog;
  sections: Record<MenuSection, SectionReport>;
}

type RawEntry = readonly [key: string, raw: unknown];

interface PassResult<T> {
  items: T[];
  report: SectionReport;
}

/** `$` followed by 1-2 digits, a decimal point and 2 digits */
const EMBEDDED_PRICE = /\$\d{1,2}\.\d{2}/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): unknown {
  return isPlainObject(value) ? value[key] : undefined;
}

function readSection(section: MenuSection, value: unknown, storeId: number): RawEntry[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (section === 'categories') {
    const parsed = categoriesSectionSchema.safeParse(value);
    if (parsed.success) {
      return parsed.data.map((raw, index) => [String(index), raw] as const);
    }
  } else {
    const parsed = recordSectionSchema.safeParse(value);
    if (parsed.success) {
      return Object.entries(parsed.data);
    }
  }

  log.warn(
    { event: 'menu_section_unrecognized', storeId, section, type: Array.isArray(value) ? 'array' : typeof value },
    '[MenuNormalizer] Section has an unexpected shape, treating as absent'
  );
  return [];
}

function runPass<T>(
  section: MenuSection,
  entries: RawEntry[],
  parse: (raw: unknown) => ParseResult<T>,
  policy: ParsePolicy,
  storeId: number
): PassResult<T> {
  if (entries.length === 0) {
    return { items: [], report: { status: 'empty', parsed: 0, skipped: 0 } };
  }

  const items: T[] = [];
  let skipped = 0;

  for (const [key, raw] of entries) {
    const result = parse(raw);
    if (result.ok) {
      items.push(result.value);
      continue;
    }

    if (policy === 'abort-pass') {
      log.warn(
        { event: 'menu_pass_aborted', storeId, section, key, issues: result.issues, discarded: entries.length },
        `[MenuNormalizer] Malformed ${section} record, discarding the section`
      );
      return { items: [], report: { status: 'aborted', parsed: 0, skipped: entries.length } };
    }

    skipped++;
    log.warn(
      { event: 'menu_record_skipped', storeId, section, key, issues: result.issues },
      `[MenuNormalizer] Malformed ${section} record skipped`
    );
  }

  return { items, report: { status: 'ok', parsed: items.length, skipped } };
}

function parseProduct(raw: unknown): ParseResult<MenuProduct> {
  const result = validateRecord(productSchema, raw);
  if (!result.ok) {
    return result;
  }
  const product = result.value;
  return {
    ok: true,
    value: {
      code: product.Code,
      name: product.Name,
      productType: product.ProductType,
      description: product.Description,
      variants: new Set(product.Variants),
    },
  };
}

function parseLineItem(raw: unknown): ParseResult<MenuLineItem> {
  const result = validateRecord(variantSchema, raw);
  if (!result.ok) {
    return result;
  }
  const variant = result.value;
  return {
    ok: true,
    value: {
      code: variant.Code,
      name: variant.Name,
      productCode: variant.ProductCode,
      sizeCode: variant.SizeCode,
      price: variant.Price,
    },
  };
}

export function formatCouponName(name: string, price: number | null): string {
  if (price === null || EMBEDDED_PRICE.test(name)) {
    return name;
  }
  return `${name} $${price.toFixed(2)}`;
}

function parseCoupon(raw: unknown): ParseResult<MenuCoupon> {
  const result = validateRecord(couponSchema, raw);
  if (!result.ok) {
    return result;
  }
  const coupon = result.value;
  return {
    ok: true,
    value: {
      code: coupon.Code,
      name: formatCouponName(coupon.Name, coupon.Price),
      price: coupon.Price,
    },
  };
}

/**
 * Normalize a menu document and report how each pass went.
 * Returns null when the document has none of the four sections.
 */
export function normalizeMenu(
  document: unknown,
  store: Pick<Store, 'id'>,
  options: NormalizeOptions = {}
): NormalizedMenu | null {
  const policy = options.policy ?? 'abort-pass';
  const storeId = store.id;

  const rawCategories = readSection('categories', child(child(child(document, 'Categorization'), 'Food'), 'Categories'), storeId);
  const rawProducts = readSection('products', child(document, 'Products'), storeId);
  const rawVariants = readSection('lineItems', child(document, 'Variants'), storeId);
  const rawCoupons = readSection('coupons', child(document, 'Coupons'), storeId);

  if (rawCategories.length + rawProducts.length + rawVariants.length + rawCoupons.length === 0) {
    log.error({ event: 'menu_unparseable', storeId }, '[MenuNormalizer] Could not find any menu data');
    return null;
  }

  const categories = runPass<MenuCategory>('categories', rawCategories, flattenCategory, policy, storeId);
  const products = runPass('products', rawProducts, parseProduct, policy, storeId);
  const lineItems = runPass('lineItems', rawVariants, parseLineItem, policy, storeId);
  const coupons = runPass('coupons', rawCoupons, parseCoupon, policy, storeId);

  const normalized: NormalizedMenu = {
    catalog: {
      storeId,
      categories: categories.items,
      products: products.items,
      lineItems: lineItems.items,
      coupons: coupons.items,
    },
    sections: {
      categories: categories.report,
      products: products.report,
      lineItems: lineItems.report,
      coupons: coupons.report,
    },
  };

  log.debug(
    { event: 'menu_normalized', storeId, policy, sections: normalized.sections },
    '[MenuNormalizer] Menu normalized'
  );

  return normalized;
}

export function buildMenuCatalog(
  document: unknown,
  store: Pick<Store, 'id'>,
  options: NormalizeOptions = {}
): MenuCatalog | null {
  return normalizeMenu(document, store, options)?.catalog ?? null;
}
