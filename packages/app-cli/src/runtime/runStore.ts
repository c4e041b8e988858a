// packages/app-cli/src/runtime/runStore.ts
import { ChatOllama } from "@langchain/ollama";

import { discoverySettings, isDebug, loadEnv, type Env } from "../../../core/src/env.js";
import { log } from "../../../core/src/logger.js";
import { OllamaDialogueService } from "../../../core/src/dialogue/ollama.js";
import { ContextActionRouter } from "../../../core/src/agent/router.js";
import { CustomerSessionManager } from "../../../core/src/agent/session/customer.js";
import { createSession } from "../../../core/src/agent/session/state.js";
import { StoreAssistant } from "../../../core/src/agent/run.js";
import { MemoryCustomerStore } from "../../../core/src/store/memoryStore.js";
import { JsonFileCustomerStore } from "../../../core/src/store/fileStore.js";
import type { CustomerStore } from "../../../core/src/store/types.js";
import type { SearchService } from "../../../core/src/search/types.js";

import { createDiscoveryClient } from "../../../integrations-discovery/src/client.js";

import { makeCli } from "../cli.js";
import { TerminalChannel } from "../channel.js";

export function buildStore(env: Env): CustomerStore {
  const storePath = (env.STORE_PATH ?? "").trim();
  return storePath ? new JsonFileCustomerStore(storePath) : new MemoryCustomerStore();
}

export function buildSearch(env: Env): SearchService | null {
  const settings = discoverySettings(env);
  if (!settings) {
    log.warn("discovery is not configured; product search is disabled");
    return null;
  }
  return createDiscoveryClient({ ...settings, debug: isDebug(env) });
}

export async function runStore(): Promise<boolean> {
  const env = loadEnv();
  const debug = isDebug(env);

  const store = buildStore(env);
  const search = buildSearch(env);

  const llm = new ChatOllama({
    baseUrl: env.OLLAMA_URL,
    model: env.OLLAMA_MODEL,
    temperature: 0.2,
  });

  const rl = makeCli();
  // Ctrl-D, or the end of piped input, stops the loop once queued lines are handled
  const stop = new AbortController();
  const channel = new TerminalChannel(rl, {
    botId: env.BOT_ID,
    profile: {
      email: env.CLI_USER_EMAIL,
      firstName: env.CLI_FIRST_NAME,
      lastName: env.CLI_LAST_NAME,
    },
    charDelayMs: env.OUTPUT_CHAR_DELAY_MS,
    onDrained: () => stop.abort(),
  });

  const assistant = new StoreAssistant({
    dialogue: new OllamaDialogueService(llm, { debug }),
    router: new ContextActionRouter({
      store,
      search,
      config: {
        dataSource: env.DISCOVERY_DATA_SOURCE,
        queryCount: env.DISCOVERY_QUERY_COUNT,
        keepCount: env.DISCOVERY_KEEP_COUNT,
        minScore: env.DISCOVERY_SCORE_FILTER,
      },
    }),
    customers: new CustomerSessionManager(channel, store),
    store,
    pollIntervalMs: env.POLL_INTERVAL_MS,
    maxAutoTurns: env.MAX_AUTO_TURNS,
  });

  process.stdout.write("Store assistant ready. Say hello.\n");
  try {
    return await assistant.run(channel, createSession(), { signal: stop.signal });
  } finally {
    rl.close();
  }
}
