// packages/core/src/store/fileStore.ts
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { removeFirst } from "./memoryStore.js";
import type { Customer, CustomerStore } from "./types.js";

const CustomerDocSchema = z.object({
  type: z.literal("customer").default("customer"),
  email: z.string().min(1),
  first_name: z.string().default(""),
  last_name: z.string().default(""),
  shopping_cart: z.array(z.string()).default([]),
});

const StoreFileSchema = z.object({
  customers: z.array(CustomerDocSchema).default([]),
});

type CustomerDoc = z.infer<typeof CustomerDocSchema>;
type StoreFile = z.infer<typeof StoreFileSchema>;

function toCustomer(doc: CustomerDoc): Customer {
  return {
    email: doc.email,
    firstName: doc.first_name,
    lastName: doc.last_name,
    cart: doc.shopping_cart,
  };
}

function toDoc(c: Customer): CustomerDoc {
  return {
    type: "customer",
    email: c.email,
    first_name: c.firstName,
    last_name: c.lastName,
    shopping_cart: c.cart,
  };
}

async function fileExists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * All customers in one JSON document on disk. The file is re-read on every
 * call so edits made while the assistant runs are picked up.
 */
export class JsonFileCustomerStore implements CustomerStore {
  constructor(private readonly filePath: string) {}

  async init() {
    if (await fileExists(this.filePath)) {
      // fail fast on a corrupt file
      await this.read();
      return;
    }
    await this.write({ customers: [] });
  }

  async find(email: string) {
    const doc = (await this.read()).customers.find((c) => c.email === email);
    return doc ? toCustomer(doc) : null;
  }

  async create(customer: Customer) {
    const data = await this.read();
    if (data.customers.some((c) => c.email === customer.email)) {
      throw new Error(`Customer already exists: ${customer.email}`);
    }
    data.customers.push(toDoc(customer));
    await this.write(data);
  }

  async listCart(email: string) {
    return (await this.find(email))?.cart ?? [];
  }

  async addCartItem(email: string, item: string) {
    await this.updateCart(email, (cart) => [...cart, item]);
  }

  async deleteCartItem(email: string, item: string) {
    await this.updateCart(email, (cart) => removeFirst(cart, item));
  }

  private async updateCart(email: string, fn: (cart: string[]) => string[]) {
    const data = await this.read();
    const doc = data.customers.find((c) => c.email === email);
    if (!doc) throw new Error(`Unknown customer: ${email}`);
    doc.shopping_cart = fn(doc.shopping_cart);
    await this.write(data);
  }

  private async read(): Promise<StoreFile> {
    const raw = await fs.readFile(this.filePath, "utf8");
    return StoreFileSchema.parse(JSON.parse(raw));
  }

  private async write(data: StoreFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), "utf8");
  }
}
