// packages/core/src/store/types.ts

export type Customer = {
  email: string;
  firstName: string;
  lastName: string;
  cart: string[];
};

export interface CustomerStore {
  /** Make sure the backing storage exists. */
  init(): Promise<void>;
  find(email: string): Promise<Customer | null>;
  create(customer: Customer): Promise<void>;
  listCart(email: string): Promise<string[]>;
  addCartItem(email: string, item: string): Promise<void>;
  deleteCartItem(email: string, item: string): Promise<void>;
}
