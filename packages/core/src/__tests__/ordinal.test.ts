import { describe, it, expect } from "vitest";
import {
  formatCartListing,
  parseOrdinal,
  resolveCartOrdinal,
  resolveResultOrdinal,
  toCartItem,
} from "../cart/ordinal.js";

describe("parseOrdinal", () => {
  it("accepts whole numbers with surrounding whitespace", () => {
    expect(parseOrdinal("2")).toBe(2);
    expect(parseOrdinal(" 3 ")).toBe(3);
    expect(parseOrdinal("+1")).toBe(1);
    expect(parseOrdinal("-1")).toBe(-1);
  });

  it("rejects anything else", () => {
    expect(parseOrdinal("two")).toBeNull();
    expect(parseOrdinal("2.5")).toBeNull();
    expect(parseOrdinal("")).toBeNull();
    expect(parseOrdinal("item 2")).toBeNull();
  });
});

describe("resolveCartOrdinal", () => {
  const cart = ["Red Mug: http://a\n", "Blue Cap: http://b\n"];

  it("maps 1-based positions onto stored items", () => {
    expect(resolveCartOrdinal(cart, 1)).toBe("Red Mug: http://a\n");
    expect(resolveCartOrdinal(cart, 2)).toBe("Blue Cap: http://b\n");
  });

  it("returns null outside the cart", () => {
    expect(resolveCartOrdinal(cart, 0)).toBeNull();
    expect(resolveCartOrdinal(cart, 3)).toBeNull();
    expect(resolveCartOrdinal(cart, -1)).toBeNull();
  });
});

describe("result ordinals", () => {
  const results = [
    { ordinal: 1, name: "Red Mug", url: "http://a", imageUrl: "" },
    { ordinal: 2, name: "Blue Cap", url: "http://b", imageUrl: "" },
  ];

  it("finds the displayed result", () => {
    expect(resolveResultOrdinal(results, 2)?.name).toBe("Blue Cap");
    expect(resolveResultOrdinal(results, 5)).toBeNull();
  });

  it("stores name and url as one cart line", () => {
    expect(toCartItem(results[0])).toBe("Red Mug: http://a\n");
  });
});

describe("formatCartListing", () => {
  it("numbers each item on its own line", () => {
    expect(formatCartListing(["mug", "cap"])).toBe("1) mug\n2) cap\n");
    expect(formatCartListing([])).toBe("");
  });
});
