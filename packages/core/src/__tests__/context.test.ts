import { describe, it, expect } from "vitest";
import {
  cartCommand,
  cartItem,
  clearCartFields,
  contextString,
  discoveryString,
  mergeContext,
  skipsInput,
} from "../dialogue/context.js";

describe("mergeContext", () => {
  it("overwrites keys present in the new map and keeps the rest", () => {
    const a = { first_name: "Ada", shopping_cart: "list", count: 1 };
    const b = { shopping_cart: "", cart_item: "2" };

    expect(mergeContext(a, b)).toEqual({ first_name: "Ada", shopping_cart: "", cart_item: "2", count: 1 });
  });

  it("is right-biased when keys overlap", () => {
    const a = { get_input: "yes" };
    const b = { get_input: "no" };

    expect(mergeContext(a, b)).toEqual({ get_input: "no" });
    expect(mergeContext(b, a)).toEqual({ get_input: "yes" });
  });

  it("copies the base when there is nothing to merge", () => {
    const a = { email: "a@example.com" };
    const merged = mergeContext(a, null);

    expect(merged).toEqual(a);
    expect(merged).not.toBe(a);
  });

  it("does not mutate either input", () => {
    const a = { x: "1" };
    const b = { y: "2" };
    mergeContext(a, b);

    expect(a).toEqual({ x: "1" });
    expect(b).toEqual({ y: "2" });
  });
});

describe("context readers", () => {
  it("reads numbers as decimal strings and other values as empty", () => {
    const ctx = { cart_item: 2, discovery_string: null, shopping_cart: ["x"] };

    expect(cartItem(ctx)).toBe("2");
    expect(discoveryString(ctx)).toBe("");
    expect(contextString(ctx, "shopping_cart")).toBe("");
  });

  it("recognizes only the known cart commands", () => {
    expect(cartCommand({ shopping_cart: "add" })).toBe("add");
    expect(cartCommand({ shopping_cart: "1) mug\n" })).toBeNull();
    expect(cartCommand({})).toBeNull();
  });

  it("treats only get_input 'no' as skipping user input", () => {
    expect(skipsInput({ get_input: "no" })).toBe(true);
    expect(skipsInput({ get_input: "yes" })).toBe(false);
    expect(skipsInput({})).toBe(false);
  });

  it("clears both cart fields", () => {
    expect(clearCartFields({ shopping_cart: "add", cart_item: "3", email: "e" })).toEqual({
      shopping_cart: "",
      cart_item: "",
      email: "e",
    });
  });
});
