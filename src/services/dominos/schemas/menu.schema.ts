/**
 * Menu response schemas
 *
 * Section schemas are lenient (a section of the wrong shape counts as absent);
 * record schemas are strict about the keys each normalizer pass needs.
 */

import { z } from 'zod';

const DECIMAL = /^\d+(\.\d+)?$/;

/** Non-negative decimal given as a JSON number or a numeric string */
export const priceSchema = z.union([
  z.number().finite().nonnegative(),
  z.string().trim().regex(DECIMAL, 'Expected a non-negative decimal').transform(Number),
]);

export const categoriesSectionSchema = z.array(z.unknown());
export const recordSectionSchema = z.record(z.unknown());

export const categoryNodeSchema = z.object({
  Categories: z.array(z.unknown()),
  Code: z.string(),
  Name: z.string(),
  Description: z.string(),
  Products: z.array(z.string()),
});

export const productSchema = z.object({
  Code: z.string(),
  Name: z.string(),
  ProductType: z.string(),
  Description: z.string(),
  Variants: z.array(z.string()),
});

export const variantSchema = z.object({
  Code: z.string(),
  Name: z.string(),
  Price: priceSchema,
  SizeCode: z.string(),
  ProductCode: z.string(),
});

export const couponSchema = z.object({
  Code: z.string(),
  Name: z.string(),
  // Null or empty string: the coupon carries no fixed price
  Price: z.union([z.null(), z.literal('').transform(() => null), priceSchema]),
});

export type RawCategoryNode = z.infer<typeof categoryNodeSchema>;
export type RawProduct = z.infer<typeof productSchema>;
export type RawVariant = z.infer<typeof variantSchema>;
export type RawCoupon = z.infer<typeof couponSchema>;
