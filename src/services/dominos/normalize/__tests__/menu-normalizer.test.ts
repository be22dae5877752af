/**
 * Menu Normalizer - Unit Tests
 *
 * - Full sample menu
 * - Per-section abort vs skip policy
 * - Price validation and coupon name decoration
 * - Unparseable documents
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildMenuCatalog, formatCouponName, normalizeMenu } from '../menu-normalizer.js';
import { loadMenuFixture } from './menu-fixture.js';

const store = { id: 4336 };

function category(code: string, products: string[], children: unknown[] = []): Record<string, unknown> {
  return { Code: code, Name: code, Description: '', Categories: children, Products: products };
}

function menuWithCategories(categories: unknown[]): Record<string, unknown> {
  return { Categorization: { Food: { Categories: categories } } };
}

describe('MenuNormalizer', () => {
  describe('sample menu', () => {
    const catalog = buildMenuCatalog(loadMenuFixture(), store);

    it('should carry the store id', () => {
      assert.equal(catalog?.storeId, 4336);
    });

    it('should flatten top-level categories only', () => {
      assert.deepEqual(catalog?.categories, [
        { code: 'Pizza', name: 'Pizza', description: 'Hand-made pizzas', products: new Set(['S_PIZZA', 'S_PIZPH']) },
        { code: 'Sides', name: 'Sides', description: '', products: new Set(['F_GARLIC', 'S_HOTWINGS']) },
      ]);
    });

    it('should parse products with a deduplicated variant set', () => {
      assert.deepEqual(catalog?.products[0], {
        code: 'S_PIZZA',
        name: 'Hand Tossed Pizza',
        productType: 'Pizza',
        description: 'Garlic-seasoned crust',
        variants: new Set(['10SCREEN', '12SCREEN']),
      });
      assert.deepEqual(catalog?.products.map((p) => p.code), ['S_PIZZA', 'S_PIZPH', 'F_GARLIC', 'S_HOTWINGS']);
    });

    it('should parse line items with numeric prices linked by product code', () => {
      assert.deepEqual(catalog?.lineItems[0], {
        code: '10SCREEN',
        name: 'Small (10") Hand Tossed Pizza',
        productCode: 'S_PIZZA',
        sizeCode: '10',
        price: 11.99,
      });
      assert.deepEqual(catalog?.lineItems.map((item) => item.price), [11.99, 13.99, 17.99, 7.49, 9.99]);
    });

    it('should decorate coupon names that do not show a price', () => {
      // Integer-like keys come back from JSON objects in ascending order
      assert.deepEqual(catalog?.coupons, [
        { code: '8685', name: '20% Off Online Orders', price: null },
        { code: '9174', name: 'Mix & Match Deal $6.99', price: 6.99 },
        { code: '9193', name: 'Large 3-Topping Pizza $13.99', price: 13.99 },
      ]);
    });

    it('should report every section as ok', () => {
      const normalized = normalizeMenu(loadMenuFixture(), store);
      assert.deepEqual(normalized?.sections, {
        categories: { status: 'ok', parsed: 2, skipped: 0 },
        products: { status: 'ok', parsed: 4, skipped: 0 },
        lineItems: { status: 'ok', parsed: 5, skipped: 0 },
        coupons: { status: 'ok', parsed: 3, skipped: 0 },
      });
    });
  });

  describe('categories', () => {
    it('should keep exactly the direct products of a leaf category', () => {
      const catalog = buildMenuCatalog(menuWithCategories([category('Pizza', ['P1', 'P2'])]), store);

      assert.equal(catalog?.categories.length, 1);
      assert.deepEqual(catalog?.categories[0]?.products, new Set(['P1', 'P2']));
    });

    it('should inherit child products when the parent lists none', () => {
      const catalog = buildMenuCatalog(
        menuWithCategories([category('Parent', [], [category('Child', ['P3'])])]),
        store
      );

      assert.equal(catalog?.categories.length, 1);
      assert.equal(catalog?.categories[0]?.code, 'Parent');
      assert.deepEqual(catalog?.categories[0]?.products, new Set(['P3']));
    });

    it('should never inherit from children when the parent lists products', () => {
      const catalog = buildMenuCatalog(
        menuWithCategories([category('Parent', ['P1'], [category('Child', ['P2'], [category('Grandchild', ['P3'])])])]),
        store
      );

      assert.deepEqual(catalog?.categories[0]?.products, new Set(['P1']));
    });

    it('should abort the whole category pass on one malformed node', () => {
      const { Description: _dropped, ...broken } = category('Broken', ['P9']);
      const normalized = normalizeMenu(
        { ...menuWithCategories([category('Pizza', ['P1']), broken]), Products: {} },
        store
      );

      assert.deepEqual(normalized?.catalog.categories, []);
      assert.deepEqual(normalized?.sections.categories, { status: 'aborted', parsed: 0, skipped: 2 });
    });

    it('should abort on a malformed node deep in a visited subtree', () => {
      const catalog = buildMenuCatalog(
        menuWithCategories([
          category('Pizza', ['P1']),
          category('Sides', [], [category('Wings', [], [{ Code: 'Hot', Products: ['P5'] }])]),
        ]),
        store
      );

      assert.deepEqual(catalog?.categories, []);
    });

    it('should drop only the malformed subtree under skip-record', () => {
      const catalog = buildMenuCatalog(
        menuWithCategories([
          category('Pizza', ['P1']),
          category('Sides', [], [{ Code: 'Broken' }]),
          category('Drinks', ['D1']),
        ]),
        store,
        { policy: 'skip-record' }
      );

      assert.deepEqual(catalog?.categories.map((c) => c.code), ['Pizza', 'Drinks']);
    });
  });

  describe('products', () => {
    it('should abort the product pass when a required key is missing', () => {
      const doc = loadMenuFixture();
      doc.Products = {
        A: { Code: 'A', Name: 'A', ProductType: 'Pizza', Description: '', Variants: ['A1'] },
        B: { Code: 'B', Name: 'B', Description: '', Variants: ['B1'] },
      };

      const normalized = normalizeMenu(doc, store);

      assert.deepEqual(normalized?.catalog.products, []);
      assert.equal(normalized?.sections.products.status, 'aborted');
      // Other passes are unaffected
      assert.equal(normalized?.catalog.lineItems.length, 5);
      assert.equal(normalized?.catalog.categories.length, 2);
    });

    it('should keep the valid products under skip-record', () => {
      const doc = loadMenuFixture();
      doc.Products = {
        A: { Code: 'A', Name: 'A', ProductType: 'Pizza', Description: '', Variants: ['A1'] },
        B: { Code: 'B', Name: 'B', Description: '', Variants: ['B1'] },
      };

      const normalized = normalizeMenu(doc, store, { policy: 'skip-record' });

      assert.deepEqual(normalized?.catalog.products.map((p) => p.code), ['A']);
      assert.deepEqual(normalized?.sections.products, { status: 'ok', parsed: 1, skipped: 1 });
    });
  });

  describe('line items', () => {
    function withVariantPrice(price: unknown): Record<string, unknown> {
      const doc = loadMenuFixture();
      doc.Variants = {
        OK: { Code: 'OK', Name: 'Fine', Price: '5.00', SizeCode: '10', ProductCode: 'S_PIZZA' },
        BAD: { Code: 'BAD', Name: 'Bad', Price: price, SizeCode: '12', ProductCode: 'S_PIZZA' },
      };
      return doc;
    }

    it('should accept a numeric price and zero', () => {
      const catalog = buildMenuCatalog(withVariantPrice(0), store);
      assert.deepEqual(catalog?.lineItems.map((item) => item.price), [5, 0]);
    });

    it('should emit no line items when one price is not a number', () => {
      const catalog = buildMenuCatalog(withVariantPrice('call store'), store);
      assert.deepEqual(catalog?.lineItems, []);
    });

    it('should emit no line items when one price is negative', () => {
      assert.deepEqual(buildMenuCatalog(withVariantPrice('-1.00'), store)?.lineItems, []);
      assert.deepEqual(buildMenuCatalog(withVariantPrice(-1), store)?.lineItems, []);
    });

    it('should emit no line items when one price is empty', () => {
      assert.deepEqual(buildMenuCatalog(withVariantPrice(''), store)?.lineItems, []);
    });
  });

  describe('coupons', () => {
    it('should append the formatted price to a plain name', () => {
      assert.equal(formatCouponName('Large Pizza', 9.99), 'Large Pizza $9.99');
    });

    it('should leave a name that already shows the price', () => {
      assert.equal(formatCouponName('Large Pizza $9.99', 9.99), 'Large Pizza $9.99');
    });

    it('should pad whole-dollar prices to cents', () => {
      assert.equal(formatCouponName('Two Medium Pizzas', 12), 'Two Medium Pizzas $12.00');
    });

    it('should leave the name alone when there is no price', () => {
      assert.equal(formatCouponName('Free Delivery', null), 'Free Delivery');
    });

    it('should abort the coupon pass on a coupon without a price key', () => {
      const doc = loadMenuFixture();
      doc.Coupons = { '1': { Code: '1', Name: 'No price key' } };

      const normalized = normalizeMenu(doc, store);

      assert.deepEqual(normalized?.catalog.coupons, []);
      assert.equal(normalized?.sections.coupons.status, 'aborted');
    });
  });

  describe('unparseable documents', () => {
    it('should return null when all four sections are missing', () => {
      assert.equal(buildMenuCatalog({ Status: 0 }, store), null);
      assert.equal(buildMenuCatalog(null, store), null);
      assert.equal(buildMenuCatalog([], store), null);
    });

    it('should return null when all four sections are empty', () => {
      const doc = { Categorization: { Food: { Categories: [] } }, Products: {}, Variants: {}, Coupons: {} };
      assert.equal(buildMenuCatalog(doc, store), null);
    });

    it('should treat a section of the wrong shape as absent', () => {
      const normalized = normalizeMenu({ Products: ['S_PIZZA'], Coupons: { '1': { Code: '1', Name: 'Deal', Price: '5.99' } } }, store);

      assert.deepEqual(normalized?.catalog.products, []);
      assert.equal(normalized?.sections.products.status, 'empty');
      assert.deepEqual(normalized?.catalog.coupons, [{ code: '1', name: 'Deal $5.99', price: 5.99 }]);
    });
  });
});
