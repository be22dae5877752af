import type { Address } from './address.js';

/** The person ordering. Contact fields are carried as given. */
export interface Customer {
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: number;
  address: Address;
}
