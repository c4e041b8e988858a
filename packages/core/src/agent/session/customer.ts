// packages/core/src/agent/session/customer.ts
import type { MessageChannel, UserProfile } from "../../channel/types.js";
import { mergeContext } from "../../dialogue/context.js";
import { moduleLogger } from "../../logger.js";
import type { Customer, CustomerStore } from "../../store/types.js";
import type { StoreSession } from "./state.js";

const log = moduleLogger("customer");

function customerFromProfile(email: string, profile: UserProfile): Customer {
  return {
    email,
    firstName: profile.firstName ?? "",
    lastName: profile.lastName ?? "",
    cart: [],
  };
}

/** Identity fields the dialogue can use, e.g. to greet the customer by name. */
export function customerContext(customer: Customer) {
  return {
    email: customer.email,
    first_name: customer.firstName,
    last_name: customer.lastName,
  };
}

export class CustomerSessionManager {
  constructor(
    private readonly channel: Pick<MessageChannel, "userProfile">,
    private readonly store: CustomerStore,
  ) {}

  /**
   * Lookup-or-create the customer behind `userId` and expose them to the dialogue.
   * Failures leave the session without a customer; cart actions then do nothing.
   */
  async resolve(session: StoreSession, userId: string): Promise<Customer | null> {
    if (session.customer) return session.customer;

    let profile: UserProfile | null;
    try {
      profile = await this.channel.userProfile(userId);
    } catch (err) {
      log.error({ err, userId }, "user profile lookup failed");
      return null;
    }

    const email = (profile?.email ?? "").trim();
    if (!profile || !email) {
      log.warn({ userId }, "user profile has no email");
      return null;
    }

    let customer: Customer;
    try {
      const found = await this.store.find(email);
      if (found) {
        log.debug({ email }, "customer found in store");
        // cart contents are always read fresh from the store
        customer = { ...found, cart: [] };
      } else {
        customer = customerFromProfile(email, profile);
        await this.store.create(customer);
        log.info({ email }, "customer created");
      }
    } catch (err) {
      log.error({ err, email }, "customer store call failed");
      return null;
    }

    session.customer = customer;
    session.context = mergeContext(session.context, customerContext(customer));
    return customer;
  }
}
