// packages/core/src/channel/parse.ts
import type { IncomingMessage } from "./types.js";

/** Raw event as a chat platform's real-time feed delivers it. */
export type ChannelEvent = {
  text?: string;
  channel?: string;
  user?: string;
  user_profile?: unknown;
};

export function mentionToken(botId: string) {
  return `<@${botId}>`;
}

/**
 * Picks the first event addressed to the bot: either it mentions the bot
 * (the mention is stripped) or it is a direct message from someone else.
 * Direct-message channel ids start with "D".
 */
export function parseChannelEvents(events: readonly ChannelEvent[] | null | undefined, botId: string): IncomingMessage | null {
  if (!events || events.length === 0) return null;
  const mention = mentionToken(botId);

  for (const ev of events) {
    if (typeof ev.text !== "string" || typeof ev.user !== "string") continue;
    // messages carrying a profile are echoes of the bot's own posts
    if (ev.user_profile !== undefined) continue;
    const channelId = ev.channel ?? "";

    if (ev.text.includes(mention)) {
      return {
        text: ev.text.split(mention).join("").trim().toLowerCase(),
        channelId,
        userId: ev.user,
      };
    }
    if (channelId.startsWith("D") && ev.user !== botId) {
      return { text: ev.text.trim().toLowerCase(), channelId, userId: ev.user };
    }
  }
  return null;
}
