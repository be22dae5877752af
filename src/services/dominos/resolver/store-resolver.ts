/**
 * Store Resolver
 *
 * Turns one store-locator response into a lazy, order-preserving sequence of
 * stores. Upstream order is kept as-is; there is no ranking here.
 *
 * A malformed entry ends the sequence: whatever follows it in the same payload
 * is not trusted. An unusable response yields an empty sequence, never an error.
 */

import { createComponentLogger } from '../../../lib/logger/structured-logger.js';
import type { DominosApiClient } from '../client/dominos-api.client.js';
import type { Address } from '../models/address.js';
import type { PickupType, Store } from '../models/store.js';
import {
  integerLikeSchema,
  locatorDocumentSchema,
  serviceFlagsSchema,
  storeAddressSchema,
  storeEntrySchema,
} from '../schemas/locator.schema.js';
import { validateRecord } from '../schemas/validate.js';

const log = createComponentLogger('StoreResolver');

export type StoreEntryFailure = 'invalid_entry' | 'missing_address' | 'invalid_number';

export type StoreEntryResult =
  | { ok: true; store: Store }
  | { ok: false; reason: StoreEntryFailure; issues: string[] };

export function parseStoreEntry(raw: unknown, pickupType: PickupType): StoreEntryResult {
  const entry = validateRecord(storeEntrySchema, raw);
  if (!entry.ok) {
    return { ok: false, reason: 'invalid_entry', issues: entry.issues };
  }

  const address = validateRecord(storeAddressSchema, entry.value.Address);
  if (!address.ok) {
    return { ok: false, reason: 'missing_address', issues: address.issues };
  }

  const { Street, City, Region, PostalCode } = address.value;
  if (![Street, City, Region, PostalCode].some(Boolean)) {
    return { ok: false, reason: 'missing_address', issues: ['Address: all fields empty'] };
  }

  const postalCode = validateRecord(integerLikeSchema, PostalCode);
  const id = validateRecord(integerLikeSchema, entry.value.StoreID);
  if (!postalCode.ok || !id.ok) {
    return {
      ok: false,
      reason: 'invalid_number',
      issues: [
        ...(postalCode.ok ? [] : postalCode.issues.map((issue) => `Address.PostalCode ${issue}`)),
        ...(id.ok ? [] : id.issues.map((issue) => `StoreID ${issue}`)),
      ],
    };
  }

  const isOnline = entry.value.IsOnlineNow === true;
  const services = serviceFlagsSchema.safeParse(entry.value.ServiceIsOpen);
  const serviceOpen = services.success && services.data[pickupType] === true;

  return {
    ok: true,
    store: {
      id: id.value,
      address: {
        street: Street ?? '',
        city: City ?? '',
        region: Region ?? '',
        postalCode: postalCode.value,
      },
      isAvailable: isOnline && serviceOpen,
    },
  };
}

/**
 * Lazily parse a locator document. Entries are validated one at a time as the
 * caller pulls, so stopping at the first available store parses nothing beyond it.
 */
export function* parseStoreLocatorResponse(document: unknown, pickupType: PickupType): Generator<Store, void, undefined> {
  const parsed = locatorDocumentSchema.safeParse(document);
  if (!parsed.success) {
    log.warn(
      { event: 'store_locator_unrecognized', issues: parsed.error.issues.length },
      '[StoreResolver] Locator response is not a store list'
    );
    return;
  }

  const stores = parsed.data.Stores ?? [];
  if (stores.length === 0) {
    log.warn({ event: 'store_locator_empty', pickupType }, '[StoreResolver] No stores found near address');
    return;
  }

  for (const [index, raw] of stores.entries()) {
    const result = parseStoreEntry(raw, pickupType);
    if (!result.ok) {
      log.warn(
        {
          event: 'store_entry_malformed',
          index,
          reason: result.reason,
          issues: result.issues,
          droppedEntries: stores.length - index,
        },
        '[StoreResolver] Could not parse store, ignoring the rest of the list'
      );
      return;
    }
    yield result.store;
  }
}

export function findFirstAvailable(stores: Iterable<Store>): Store | null {
  for (const store of stores) {
    if (store.isAvailable) {
      return store;
    }
  }
  return null;
}

export class StoreResolver {
  constructor(private readonly client: DominosApiClient) {}

  /**
   * One locator request per call. The returned generator is single-use;
   * call again for a fresh request.
   */
  async *findStores(address: Address, pickupType: PickupType): AsyncGenerator<Store, void, undefined> {
    const result = await this.client.fetchStoreLocator(address, pickupType);
    if (!result.ok) {
      return;
    }
    yield* parseStoreLocatorResponse(result.data, pickupType);
  }

  async closestAvailable(address: Address, pickupType: PickupType): Promise<Store | null> {
    for await (const store of this.findStores(address, pickupType)) {
      if (store.isAvailable) {
        return store;
      }
    }

    log.info({ event: 'store_none_available', pickupType }, '[StoreResolver] No available store for address');
    return null;
  }
}
