// packages/core/src/store/memoryStore.ts
import type { Customer, CustomerStore } from "./types.js";

export function removeFirst(items: string[], item: string): string[] {
  const idx = items.indexOf(item);
  if (idx === -1) return items;
  return [...items.slice(0, idx), ...items.slice(idx + 1)];
}

/** Process-local store. Used when no store file is configured. */
export class MemoryCustomerStore implements CustomerStore {
  private customers = new Map<string, Customer>();

  constructor(seed: Customer[] = []) {
    for (const c of seed) this.customers.set(c.email, { ...c, cart: [...c.cart] });
  }

  async init() {}

  async find(email: string) {
    const c = this.customers.get(email);
    return c ? { ...c, cart: [...c.cart] } : null;
  }

  async create(customer: Customer) {
    if (this.customers.has(customer.email)) throw new Error(`Customer already exists: ${customer.email}`);
    this.customers.set(customer.email, { ...customer, cart: [...customer.cart] });
  }

  async listCart(email: string) {
    return [...(this.customers.get(email)?.cart ?? [])];
  }

  async addCartItem(email: string, item: string) {
    const c = this.require(email);
    c.cart = [...c.cart, item];
  }

  async deleteCartItem(email: string, item: string) {
    const c = this.require(email);
    c.cart = removeFirst(c.cart, item);
  }

  private require(email: string): Customer {
    const c = this.customers.get(email);
    if (!c) throw new Error(`Unknown customer: ${email}`);
    return c;
  }
}
