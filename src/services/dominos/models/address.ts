/**
 * Address model and the locator query fragments derived from it
 */

export enum Country {
  UNITED_STATES = 'us',
  CANADA = 'ca',
}

/**
 * North American street address. Callers normalize it before it reaches the client.
 */
export interface Address {
  street: string;
  city: string;
  region: string;
  postalCode: number;
}

export interface AddressLines {
  lineOne: string;
  lineTwo: string;
}

/**
 * Split an address into the two fragments the store locator expects:
 * `s` (street) and `c` (city, region and postal code).
 */
export function formatAddressLines(address: Address): AddressLines {
  return {
    lineOne: address.street,
    lineTwo: `${address.city} ${address.region} ${address.postalCode}`,
  };
}
