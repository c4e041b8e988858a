// packages/core/src/agent/run.ts
import { setTimeout as sleep } from "node:timers/promises";

import type { IncomingMessage, MessageChannel } from "../channel/types.js";
import { mergeContext } from "../dialogue/context.js";
import type { DialogueReply, DialogueService } from "../dialogue/types.js";
import { moduleLogger } from "../logger.js";
import type { CustomerStore } from "../store/types.js";
import type { ContextActionRouter, RouterAction } from "./router.js";
import type { CustomerSessionManager } from "./session/customer.js";
import type { StoreSession } from "./session/state.js";

const log = moduleLogger("assistant");

export const DEFAULT_MAX_AUTO_TURNS = 10;

export type TurnTrace = {
  actions: RouterAction["kind"][];
  /** Why the chain of turns ended. */
  stoppedBy: "await_input" | "dialogue_error" | "turn_limit";
};

export type AssistantDeps = {
  dialogue: DialogueService;
  router: ContextActionRouter;
  customers: CustomerSessionManager;
  store: CustomerStore;
  pollIntervalMs?: number;
  maxAutoTurns?: number;
};

export class StoreAssistant {
  constructor(private readonly deps: AssistantDeps) {}

  /**
   * One user message, processed to completion. The dialogue is called again
   * with the same text after every action that needs no user input, until the
   * router asks for input or the turn limit is hit.
   */
  async handleMessage(session: StoreSession, text: string, reply: (text: string) => Promise<void>): Promise<TurnTrace> {
    const { dialogue, router } = this.deps;
    const maxTurns = this.deps.maxAutoTurns ?? DEFAULT_MAX_AUTO_TURNS;
    const actions: RouterAction["kind"][] = [];

    for (let turn = 0; turn <= maxTurns; turn++) {
      let answer: DialogueReply;
      try {
        answer = await dialogue.send(text, session.context);
      } catch (err) {
        log.error({ err, text, turn }, "dialogue call failed");
        return { actions, stoppedBy: "dialogue_error" };
      }

      session.context = mergeContext(session.context, answer.context);
      log.debug({ turn, context: session.context }, "dialogue answered");

      const out = answer.output.map((line) => `${line}\n`).join("");
      if (out.trim()) {
        try {
          await reply(out);
        } catch (err) {
          log.error({ err }, "posting reply failed");
        }
      }

      const action = router.decide(session.context);
      actions.push(action.kind);
      if (await router.dispatch(session, action)) {
        return { actions, stoppedBy: "await_input" };
      }
    }

    log.warn({ text, maxTurns }, "automatic turn limit reached; waiting for input");
    return { actions, stoppedBy: "turn_limit" };
  }

  /**
   * Poll loop: at most one message in flight, a pause between polls.
   * Resolves false when the channel refuses to connect.
   */
  async run(channel: MessageChannel, session: StoreSession, opts: { signal?: AbortSignal } = {}): Promise<boolean> {
    const { customers, store } = this.deps;
    const pollMs = this.deps.pollIntervalMs ?? 500;

    await store.init();

    if (!(await channel.connect())) {
      log.fatal("channel connection failed; invalid token or bot id?");
      return false;
    }
    log.info("store assistant is connected and running");

    while (!opts.signal?.aborted) {
      let incoming: IncomingMessage | null;
      try {
        incoming = await channel.receive();
      } catch (err) {
        log.error({ err }, "reading from channel failed");
        incoming = null;
      }

      if (incoming) {
        log.debug({ message: incoming.text, channel: incoming.channelId }, "message received");
        if (!session.customer) await customers.resolve(session, incoming.userId);

        const channelId = incoming.channelId;
        await this.handleMessage(session, incoming.text, (text) => channel.send(channelId, text));
      }

      if (opts.signal?.aborted) break;
      await sleep(pollMs);
    }
    return true;
  }
}
