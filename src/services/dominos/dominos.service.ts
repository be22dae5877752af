/**
 * Dominos Service
 *
 * Entry point tying the API client, store resolver and menu normalizer
 * together. Stateless: instances can be shared across concurrent callers.
 */

import { createComponentLogger } from '../../lib/logger/structured-logger.js';
import { DominosApiClient, FetchTransport, type DominosTransport } from './client/dominos-api.client.js';
import { DominosConfig, type DominosClientConfig, type ParsePolicy } from './config/dominos.config.js';
import type { Address } from './models/address.js';
import type { Customer } from './models/customer.js';
import type { MenuCatalog } from './models/menu.js';
import type { PickupType, Store } from './models/store.js';
import { buildMenuCatalog } from './normalize/menu-normalizer.js';
import { StoreResolver } from './resolver/store-resolver.js';

const log = createComponentLogger('DominosService');

export interface DominosServiceOptions {
  transport?: DominosTransport;
  config?: Readonly<DominosClientConfig>;
}

export class DominosService {
  private readonly client: DominosApiClient;
  private readonly resolver: StoreResolver;
  private readonly parsePolicy: ParsePolicy;

  constructor(options: DominosServiceOptions = {}) {
    const config = options.config ?? DominosConfig;
    const transport = options.transport ?? new FetchTransport({ timeoutMs: config.timeoutMs });
    this.client = new DominosApiClient(transport, config);
    this.resolver = new StoreResolver(this.client);
    this.parsePolicy = config.parsePolicy;
  }

  /**
   * Stores near the address in upstream order. Single-use; an unusable
   * response yields nothing.
   */
  getNearestStores(address: Address, pickupType: PickupType): AsyncGenerator<Store, void, undefined> {
    return this.resolver.findStores(address, pickupType);
  }

  getStoreClosestToAddress(address: Address, pickupType: PickupType): Promise<Store | null> {
    return this.resolver.closestAvailable(address, pickupType);
  }

  getStoreClosestToCustomer(customer: Customer, pickupType: PickupType): Promise<Store | null> {
    return this.resolver.closestAvailable(customer.address, pickupType);
  }

  async getMenuForStore(store: Pick<Store, 'id'>): Promise<MenuCatalog | null> {
    const result = await this.client.fetchMenu(store.id);
    if (!result.ok) {
      return null;
    }

    const catalog = buildMenuCatalog(result.data, store, { policy: this.parsePolicy });
    if (catalog) {
      log.info(
        {
          event: 'menu_loaded',
          storeId: store.id,
          categories: catalog.categories.length,
          products: catalog.products.length,
          lineItems: catalog.lineItems.length,
          coupons: catalog.coupons.length,
        },
        '[DominosService] Menu loaded'
      );
    }
    return catalog;
  }
}
