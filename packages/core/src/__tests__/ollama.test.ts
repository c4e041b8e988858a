import { describe, it, expect, vi } from "vitest";
import type { BaseMessage } from "@langchain/core/messages";
import { OllamaDialogueService, type ChatModel } from "../dialogue/ollama.js";
import { parseDialogueTurn } from "../dialogue/schema.js";
import { DialogueError } from "../dialogue/types.js";

function modelAnswering(...answers: string[]) {
  const calls: BaseMessage[][] = [];
  const llm: ChatModel = {
    invoke: vi.fn(async (messages: BaseMessage[]) => {
      calls.push(messages);
      return { content: answers[Math.min(calls.length - 1, answers.length - 1)] };
    }),
  };
  return { llm, calls };
}

describe("parseDialogueTurn", () => {
  it("reads the JSON object out of surrounding text", () => {
    const text = 'Sure:\n{"context":{"discovery_string":"mugs"},"output":["Looking."]}\nDone';
    expect(parseDialogueTurn(text)).toEqual({ context: { discovery_string: "mugs" }, output: ["Looking."] });
  });

  it("accepts a single output string and missing fields", () => {
    expect(parseDialogueTurn('{"output":"Hi"}')).toEqual({ context: {}, output: ["Hi"] });
  });

  it("rejects non-JSON and wrong shapes", () => {
    expect(parseDialogueTurn("no json here")).toBeNull();
    expect(parseDialogueTurn('{"context":"nope"}')).toBeNull();
  });
});

describe("OllamaDialogueService", () => {
  it("sends prompt, context and user text, returns the parsed turn", async () => {
    const { llm, calls } = modelAnswering('{"context":{"shopping_cart":"list"},"output":["Here is your cart."]}');
    const service = new OllamaDialogueService(llm);

    const reply = await service.send("what is in my cart", { first_name: "Ada" });

    expect(reply).toEqual({ context: { shopping_cart: "list" }, output: ["Here is your cart."] });
    expect(calls).toHaveLength(1);
    expect(calls[0]).toHaveLength(3);
    expect(calls[0][1].content).toBe('CONTEXT:\n{"first_name":"Ada"}');
    expect(calls[0][2].content).toBe("what is in my cart");
  });

  it("asks again once after invalid JSON", async () => {
    const { llm, calls } = modelAnswering("I think you want mugs", '{"context":{},"output":["ok"]}');
    const service = new OllamaDialogueService(llm);

    expect(await service.send("mugs", {})).toEqual({ context: {}, output: ["ok"] });
    expect(calls).toHaveLength(2);
    expect(calls[1]).toHaveLength(4);
  });

  it("throws DialogueError when the retry is invalid too", async () => {
    const { llm } = modelAnswering("nope", "still nope");
    const service = new OllamaDialogueService(llm);

    await expect(service.send("mugs", {})).rejects.toBeInstanceOf(DialogueError);
  });
});
