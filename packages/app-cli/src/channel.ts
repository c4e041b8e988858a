// packages/app-cli/src/channel.ts
import type { Interface } from "node:readline";

import { parseChannelEvents, type ChannelEvent } from "../../core/src/channel/parse.js";
import type { IncomingMessage, MessageChannel, UserProfile } from "../../core/src/channel/types.js";
import { typewriterPrint } from "./cli.js";

export const CLI_CHANNEL_ID = "D-cli";
export const CLI_USER_ID = "U-cli";

export type TerminalChannelOptions = {
  botId: string;
  profile: UserProfile;
  charDelayMs?: number;
  out?: NodeJS.WritableStream;
  /** Called once the input has ended and every queued line was received. */
  onDrained?: () => void;
};

/**
 * A terminal session behaves like a direct-message channel: every typed line
 * becomes one event from the local user.
 */
export class TerminalChannel implements MessageChannel {
  private pending: ChannelEvent[] = [];
  private closed = false;
  private drained = false;

  constructor(
    private readonly rl: Interface,
    private readonly opts: TerminalChannelOptions,
  ) {
    rl.on("line", (line) => {
      if (line.trim()) this.pending.push({ text: line, channel: CLI_CHANNEL_ID, user: CLI_USER_ID });
    });
    rl.on("close", () => {
      this.closed = true;
      this.checkDrained();
    });
  }

  // nothing to authenticate locally
  async connect() {
    return true;
  }

  async receive(): Promise<IncomingMessage | null> {
    try {
      while (this.pending.length > 0) {
        const ev = this.pending.shift();
        const msg = parseChannelEvents(ev ? [ev] : [], this.opts.botId);
        if (msg) return msg;
      }
      return null;
    } finally {
      this.checkDrained();
    }
  }

  async send(_channelId: string, text: string) {
    await typewriterPrint(text.trimEnd(), this.opts.charDelayMs ?? 0, this.opts.out);
  }

  private checkDrained() {
    if (this.drained || !this.closed || this.pending.length > 0) return;
    this.drained = true;
    this.opts.onDrained?.();
  }

  async userProfile(userId: string): Promise<UserProfile | null> {
    return userId === CLI_USER_ID ? this.opts.profile : null;
  }
}
