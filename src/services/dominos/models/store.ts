import type { Address } from './address.js';

/**
 * How the customer receives the order. The value keys `ServiceIsOpen` in the
 * locator response and is sent as the locator `type` parameter.
 */
export enum PickupType {
  DELIVERY = 'Delivery',
  CARRYOUT = 'Carryout',
}

/**
 * One candidate store returned by the locator.
 * `isAvailable` is computed for the pickup type the lookup was made with.
 */
export interface Store {
  readonly id: number;
  readonly address: Address;
  readonly isAvailable: boolean;
}
