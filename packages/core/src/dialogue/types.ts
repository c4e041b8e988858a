// packages/core/src/dialogue/types.ts
import type { Context } from "./context.js";

export type DialogueReply = {
  context: Context;
  output: string[];
};

export interface DialogueService {
  send(text: string, context: Context): Promise<DialogueReply>;
}

export class DialogueError extends Error {
  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super(message);
    this.name = "DialogueError";
  }
}
