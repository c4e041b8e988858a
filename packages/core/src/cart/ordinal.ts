// packages/core/src/cart/ordinal.ts
import type { FormattedResult } from "../search/types.js";

/**
 * Ordinals arrive from the dialogue service as free text ("2", " 3 ", "+1").
 * Anything that is not a whole number is rejected.
 */
export function parseOrdinal(value: string): number | null {
  const m = value.match(/^\s*([+-]?\d+)\s*$/);
  if (!m) return null;
  const n = Number(m[1]);
  return Number.isSafeInteger(n) ? n : null;
}

function atOrdinal<T>(items: readonly T[], ordinal: number): T | null {
  if (ordinal < 1 || ordinal > items.length) return null;
  return items[ordinal - 1] ?? null;
}

/** Stored cart entry shown as line `ordinal` of the cart listing. */
export function resolveCartOrdinal(items: readonly string[], ordinal: number): string | null {
  return atOrdinal(items, ordinal);
}

/** Entry of the last displayed search results carrying this ordinal. */
export function resolveResultOrdinal(results: readonly FormattedResult[], ordinal: number): FormattedResult | null {
  return results.find((r) => r.ordinal === ordinal) ?? null;
}

export function toCartItem(result: FormattedResult): string {
  return `${result.name}: ${result.url}\n`;
}

export function formatCartListing(items: readonly string[]): string {
  return items.map((item, i) => `${i + 1}) ${item}\n`).join("");
}
