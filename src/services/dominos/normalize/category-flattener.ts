/**
 * Category Flattener
 *
 * Folds one top-level category node and its subtree into a single
 * MenuCategory. A node's product set is its own Products list when that list
 * is non-empty; otherwise it is the union of its children's product sets,
 * each computed by the same rule. Children of a node with direct products are
 * never visited.
 *
 * Traversal is an explicit post-order walk, so tree depth is not bounded by
 * the call stack.
 */

import type { MenuCategory } from '../models/menu.js';
import { categoryNodeSchema, type RawCategoryNode } from '../schemas/menu.schema.js';
import { validateRecord, type ParseResult } from '../schemas/validate.js';

interface Frame {
  node: RawCategoryNode;
  path: string;
  nextChild: number;
  products: Set<string>;
}

function validateNode(raw: unknown, path: string): ParseResult<RawCategoryNode> {
  const result = validateRecord(categoryNodeSchema, raw);
  if (result.ok) {
    return result;
  }
  return { ok: false, issues: result.issues.map((issue) => `${path} ${issue}`) };
}

export function flattenCategory(raw: unknown): ParseResult<MenuCategory> {
  const root = validateNode(raw, 'category');
  if (!root.ok) {
    return root;
  }

  const node = root.value;
  const toCategory = (products: Set<string>): ParseResult<MenuCategory> => ({
    ok: true,
    value: {
      code: node.Code,
      name: node.Name,
      description: node.Description,
      products,
    },
  });

  if (node.Products.length > 0) {
    return toCategory(new Set(node.Products));
  }

  const rootFrame: Frame = { node, path: node.Code, nextChild: 0, products: new Set() };
  const stack: Frame[] = [rootFrame];

  while (stack.length > 0) {
    const top = stack[stack.length - 1];

    if (top.nextChild < top.node.Categories.length) {
      const childIndex = top.nextChild++;
      const child = validateNode(top.node.Categories[childIndex], `${top.path}.Categories[${childIndex}]`);
      if (!child.ok) {
        return child;
      }

      if (child.value.Products.length > 0) {
        for (const code of child.value.Products) {
          top.products.add(code);
        }
      } else {
        stack.push({
          node: child.value,
          path: `${top.path}.${child.value.Code}`,
          nextChild: 0,
          products: new Set(),
        });
      }
      continue;
    }

    stack.pop();
    if (stack.length > 0) {
      const parent = stack[stack.length - 1];
      for (const code of top.products) {
        parent.products.add(code);
      }
    }
  }

  return toCategory(rootFrame.products);
}
