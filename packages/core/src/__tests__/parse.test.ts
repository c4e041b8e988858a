import { describe, it, expect } from "vitest";
import { parseChannelEvents } from "../channel/parse.js";

describe("parseChannelEvents", () => {
  const bot = "UBOT";

  it("strips the bot mention and lower-cases the text", () => {
    const events = [{ text: "<@UBOT> Show me MUGS ", channel: "C42", user: "U1" }];
    expect(parseChannelEvents(events, bot)).toEqual({ text: "show me mugs", channelId: "C42", userId: "U1" });
  });

  it("accepts direct messages without a mention", () => {
    const events = [{ text: " List My Cart", channel: "D7", user: "U1" }];
    expect(parseChannelEvents(events, bot)).toEqual({ text: "list my cart", channelId: "D7", userId: "U1" });
  });

  it("ignores channel chatter, the bot's own messages and profile echoes", () => {
    expect(parseChannelEvents([{ text: "hello all", channel: "C42", user: "U1" }], bot)).toBeNull();
    expect(parseChannelEvents([{ text: "reply", channel: "D7", user: "UBOT" }], bot)).toBeNull();
    expect(parseChannelEvents([{ text: "<@UBOT> hi", channel: "C42", user: "U1", user_profile: {} }], bot)).toBeNull();
    expect(parseChannelEvents([{ channel: "C1" }], bot)).toBeNull();
    expect(parseChannelEvents([], bot)).toBeNull();
    expect(parseChannelEvents(null, bot)).toBeNull();
  });

  it("returns the first matching event", () => {
    const events = [
      { text: "noise", channel: "C1", user: "U9" },
      { text: "first", channel: "D1", user: "U1" },
      { text: "second", channel: "D1", user: "U1" },
    ];
    expect(parseChannelEvents(events, bot)?.text).toBe("first");
  });
});
