// packages/core/src/agent/router.ts
import {
  cartCommand,
  cartItem,
  clearCartFields,
  discoveryString,
  mergeContext,
  skipsInput,
  type Context,
} from "../dialogue/context.js";
import { formatCartListing, parseOrdinal, resolveCartOrdinal, resolveResultOrdinal, toCartItem } from "../cart/ordinal.js";
import { formatSearchResults } from "../search/format.js";
import type { DataSource, SearchResponse, SearchService } from "../search/types.js";
import type { CustomerStore } from "../store/types.js";
import { moduleLogger } from "../logger.js";
import { updateSessionFromSearch, type StoreSession } from "./session/state.js";

const log = moduleLogger("router");

export type RouterAction =
  | { kind: "search"; query: string }
  | { kind: "list_cart" }
  | { kind: "add_to_cart"; item: string }
  | { kind: "delete_from_cart"; item: string }
  | { kind: "continue" }
  | { kind: "await_input" };

/**
 * Picks the one action the context asks for. Order matters: a single dialogue
 * answer can set several fields, and search must run before any cart action.
 */
export function decideAction(context: Context, opts: { searchEnabled: boolean }): RouterAction {
  const query = discoveryString(context);
  if (query && opts.searchEnabled) return { kind: "search", query };

  const command = cartCommand(context);
  const item = cartItem(context);
  if (command === "list") return { kind: "list_cart" };
  if (command === "add" && item) return { kind: "add_to_cart", item };
  if (command === "delete" && item) return { kind: "delete_from_cart", item };

  if (skipsInput(context)) return { kind: "continue" };
  return { kind: "await_input" };
}

export type RouterConfig = {
  dataSource: DataSource;
  queryCount: number;
  keepCount: number;
  minScore: number;
};

export class ContextActionRouter {
  constructor(
    private readonly deps: {
      store: CustomerStore;
      search: SearchService | null;
      config: RouterConfig;
    },
  ) {}

  get searchEnabled() {
    return this.deps.search !== null;
  }

  decide(context: Context): RouterAction {
    return decideAction(context, { searchEnabled: this.searchEnabled });
  }

  /** Runs the action; resolves true when the loop should wait for the user. */
  async dispatch(session: StoreSession, action: RouterAction): Promise<boolean> {
    switch (action.kind) {
      case "search":
        await this.search(session, action.query);
        return false;
      case "list_cart":
        await this.listCart(session);
        return false;
      case "add_to_cart":
        await this.addToCart(session, action.item);
        return false;
      case "delete_from_cart":
        await this.deleteFromCart(session, action.item);
        return false;
      case "continue":
        return false;
      case "await_input":
        return true;
    }
  }

  private async search(session: StoreSession, query: string) {
    const { search, config } = this.deps;
    if (!search) return;

    let response: SearchResponse;
    try {
      response = await search.query(query, config.queryCount);
    } catch (err) {
      log.error({ err, query }, "search query failed");
      response = { results: [] };
    }

    const formatted = formatSearchResults(response, {
      dataSource: config.dataSource,
      minScore: config.minScore,
      keepCount: config.keepCount,
    });
    log.debug(
      { query, received: response.results?.length ?? 0, matching: formatted.matching, kept: formatted.results.length },
      "search results formatted",
    );

    updateSessionFromSearch(session, query, formatted.results);
    session.context = mergeContext(session.context, { discovery_result: formatted.text });
  }

  private async listCart(session: StoreSession) {
    const customer = session.customer;
    if (!customer) {
      log.warn("cart listing requested without a customer");
      session.context = clearCartFields(session.context);
      return;
    }

    let listing = "";
    try {
      listing = formatCartListing(await this.deps.store.listCart(customer.email));
    } catch (err) {
      log.error({ err, email: customer.email }, "listing cart failed");
    }
    session.context = mergeContext(session.context, { shopping_cart: listing });
  }

  private async addToCart(session: StoreSession, rawOrdinal: string) {
    try {
      const customer = session.customer;
      if (!customer) {
        log.warn("add to cart requested without a customer");
        return;
      }

      const ordinal = parseOrdinal(rawOrdinal);
      if (ordinal === null) {
        log.warn({ cart_item: rawOrdinal }, "cart_item must be a number");
        return;
      }

      const result = resolveResultOrdinal(session.lastResults, ordinal);
      if (!result) {
        log.info(
          { ordinal, shown: session.lastResults.length, query: session.lastQuery },
          "no search result with that number",
        );
        return;
      }

      await this.deps.store.addCartItem(customer.email, toCartItem(result));
    } catch (err) {
      log.error({ err, cart_item: rawOrdinal }, "adding to cart failed");
    } finally {
      session.context = clearCartFields(session.context);
    }
  }

  private async deleteFromCart(session: StoreSession, rawOrdinal: string) {
    try {
      const customer = session.customer;
      if (!customer) {
        log.warn("delete from cart requested without a customer");
        return;
      }

      const ordinal = parseOrdinal(rawOrdinal);
      if (ordinal === null) {
        log.warn({ cart_item: rawOrdinal }, "cart_item must be a number");
        return;
      }

      const items = await this.deps.store.listCart(customer.email);
      const item = resolveCartOrdinal(items, ordinal);
      if (item === null) {
        log.info({ ordinal, size: items.length }, "no cart item with that number");
        return;
      }

      await this.deps.store.deleteCartItem(customer.email, item);
    } catch (err) {
      log.error({ err, cart_item: rawOrdinal }, "deleting from cart failed");
    } finally {
      session.context = clearCartFields(session.context);
    }
  }
}
