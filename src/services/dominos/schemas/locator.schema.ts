/**
 * Store locator response schemas
 *
 * Only the fields the resolver reads are declared; everything else passes through.
 */

import { z } from 'zod';

/** Integer given either as a JSON number or as a string of digits */
export const integerLikeSchema = z.union([
  z.number().int(),
  z.string().trim().regex(/^[+-]?\d+$/, 'Expected an integer string').transform((s) => Number.parseInt(s, 10)),
]);

export const locatorDocumentSchema = z.object({
  Stores: z.array(z.unknown()).optional(),
}).passthrough();

export const storeAddressSchema = z.object({
  Street: z.string().nullish(),
  City: z.string().nullish(),
  Region: z.string().nullish(),
  PostalCode: z.union([z.string(), z.number()]).nullish(),
}).passthrough();

/** Per-pickup-type open flags; anything but a plain object advertises nothing. */
export const serviceFlagsSchema = z.record(z.unknown());

export const storeEntrySchema = z.object({
  StoreID: z.unknown(),
  IsOnlineNow: z.unknown(),
  ServiceIsOpen: z.unknown(),
  Address: z.unknown(),
}).passthrough();

export type RawStoreAddress = z.infer<typeof storeAddressSchema>;
export type RawStoreEntry = z.infer<typeof storeEntrySchema>;
