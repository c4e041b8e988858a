// packages/core/src/agent/session/state.ts
import type { Context } from "../../dialogue/context.js";
import type { FormattedResult } from "../../search/types.js";
import type { Customer } from "../../store/types.js";

export type StoreSession = {
  context: Context;
  customer: Customer | null;

  /** Results the user sees numbered; "add 2" refers to these. */
  lastResults: FormattedResult[];
  lastQuery: string | null;
};

export function createSession(context: Context = {}): StoreSession {
  return {
    context: { ...context },
    customer: null,

    lastResults: [],
    lastQuery: null,
  };
}

export function updateSessionFromSearch(session: StoreSession, query: string, results: FormattedResult[]) {
  session.lastResults = results;
  session.lastQuery = query;
}
