// packages/core/src/dialogue/context.ts

/**
 * Conversation context exchanged with the dialogue service on every turn.
 * The dialogue service writes the control fields below; the router reads them.
 */
export type Context = Record<string, unknown>;

export type CartCommand = "list" | "add" | "delete";

/**
 * Right-biased merge: every key in `next` replaces the one in `base`,
 * keys only in `base` survive. Neither input is mutated.
 */
export function mergeContext(base: Context, next?: Context | null): Context {
  if (!next) return { ...base };
  return { ...base, ...next };
}

export function contextString(context: Context, key: string): string {
  const v = context[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return "";
}

export function discoveryString(context: Context): string {
  return contextString(context, "discovery_string");
}

export function cartCommand(context: Context): CartCommand | null {
  const v = contextString(context, "shopping_cart");
  return v === "list" || v === "add" || v === "delete" ? v : null;
}

export function cartItem(context: Context): string {
  return contextString(context, "cart_item");
}

/** `get_input: "no"` asks for another automatic turn without waiting on the user. */
export function skipsInput(context: Context): boolean {
  return contextString(context, "get_input") === "no";
}

export function clearCartFields(context: Context): Context {
  return mergeContext(context, { shopping_cart: "", cart_item: "" });
}
