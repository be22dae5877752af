export { DominosService, type DominosServiceOptions } from './services/dominos/dominos.service.js';
export {
  DominosApiClient,
  DominosApiError,
  FetchTransport,
  buildMenuUrl,
  buildStoreLocatorUrl,
  type DominosErrorKind,
  type DominosTransport,
  type FetchTransportOptions,
  type JsonFetchResult,
} from './services/dominos/client/dominos-api.client.js';
export {
  DominosConfig,
  parseDominosConfig,
  PARSE_POLICIES,
  type DominosClientConfig,
  type ParsePolicy,
} from './services/dominos/config/dominos.config.js';
export { Country, formatAddressLines, type Address, type AddressLines } from './services/dominos/models/address.js';
export type { Customer } from './services/dominos/models/customer.js';
export type {
  MenuCatalog,
  MenuCategory,
  MenuCoupon,
  MenuLineItem,
  MenuProduct,
} from './services/dominos/models/menu.js';
export { PickupType, type Store } from './services/dominos/models/store.js';
export {
  StoreResolver,
  findFirstAvailable,
  parseStoreEntry,
  parseStoreLocatorResponse,
  type StoreEntryFailure,
  type StoreEntryResult,
} from './services/dominos/resolver/store-resolver.js';
export {
  buildMenuCatalog,
  formatCouponName,
  normalizeMenu,
  type MenuSection,
  type NormalizedMenu,
  type NormalizeOptions,
  type SectionReport,
} from './services/dominos/normalize/menu-normalizer.js';
export { flattenCategory } from './services/dominos/normalize/category-flattener.js';
export {
  formatMenu,
  getLineItemsForProduct,
  getProductsForCategory,
  searchLineItems,
  type LineItemConditions,
} from './services/dominos/menu/menu-query.js';
export type { ParseResult } from './services/dominos/schemas/validate.js';
export { createComponentLogger, logger, type Logger } from './lib/logger/structured-logger.js';
