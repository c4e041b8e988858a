// packages/core/src/dialogue/ollama.ts
import { HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from "@langchain/core/messages";

import type { Context } from "./context.js";
import { parseDialogueTurn } from "./schema.js";
import { DialogueError, type DialogueReply, type DialogueService } from "./types.js";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("dialogue");

/** The slice of a LangChain chat model this service calls. */
export interface ChatModel {
  invoke(messages: BaseMessage[]): Promise<{ content: MessageContent }>;
}

export function dialogueSystemPrompt(): string {
  return [
    "You are the dialogue manager of an online store chat assistant.",
    "Each turn you receive the conversation CONTEXT (JSON) and the customer's message.",
    "You decide what to say and which fields of the context to change. The application reads those fields and acts on them.",
    "",
    "You MUST output ONLY one valid JSON object. No markdown. No commentary.",
    "Shape:",
    "{\"context\":{...fields to set...},\"output\":[\"reply line\", \"...\"]}",
    "",
    "Context fields you control:",
    "- discovery_string: product search text. Set it to search the catalog. Set it to \"\" once discovery_result is present.",
    "- discovery_result: written by the application; numbered search results. Show them to the customer.",
    "- shopping_cart: \"list\" to show the cart, \"add\" or \"delete\" to change it, \"\" otherwise.",
    "  After a \"list\" the application replaces it with the numbered cart lines; show them and set it back to \"\".",
    "- cart_item: the number (as a string) of the search result to add, or of the cart line to delete.",
    "- get_input: \"no\" when you want another turn right away without waiting for the customer, otherwise \"yes\".",
    "",
    "Rules:",
    "- Only set the fields that change.",
    "- Never invent products; only mention items from discovery_result or the cart.",
    "- If first_name is present, greet the customer by name once.",
    "- Numbers the customer uses (\"add 2\", \"remove the first one\") refer to the last numbered list shown.",
  ].join("\n");
}

function contentText(content: MessageContent): string {
  return typeof content === "string" ? content : JSON.stringify(content);
}

/**
 * Dialogue service backed by a local chat model. The model plays the part of
 * the conversation engine: it reads the context and returns the updated fields.
 */
export class OllamaDialogueService implements DialogueService {
  constructor(
    private readonly llm: ChatModel,
    private readonly opts: { debug?: boolean } = {},
  ) {}

  async send(text: string, context: Context): Promise<DialogueReply> {
    const prompt = dialogueSystemPrompt();
    const contextMessage = new SystemMessage(`CONTEXT:\n${JSON.stringify(context)}`);

    const first = await this.llm.invoke([new SystemMessage(prompt), contextMessage, new HumanMessage(text)]);
    const firstText = contentText(first.content);
    let turn = parseDialogueTurn(firstText);

    if (!turn) {
      const regen = await this.llm.invoke([
        new SystemMessage(prompt),
        contextMessage,
        new SystemMessage(
          "Your previous output was invalid JSON. Output ONLY one JSON object with keys \"context\" (object) and \"output\" (array of strings).",
        ),
        new HumanMessage(text),
      ]);
      const regenText = contentText(regen.content);
      turn = parseDialogueTurn(regenText);

      if (!turn) {
        throw new DialogueError("dialogue model returned invalid JSON twice", regenText.slice(0, 400));
      }
      if (this.opts.debug) log.debug("recovered with regen repair");
    }

    if (this.opts.debug) log.debug({ turn }, "dialogue turn");
    return { context: turn.context, output: turn.output };
  }
}
