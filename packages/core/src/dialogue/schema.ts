// packages/core/src/dialogue/schema.ts
import { z } from "zod";

export const DialogueTurnSchema = z.object({
  context: z.record(z.unknown()).default({}),
  output: z.union([z.array(z.string()), z.string().transform((s) => [s])]).default([]),
});

export type DialogueTurn = z.infer<typeof DialogueTurnSchema>;

export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < 0 || end <= start) return null;
  return text.slice(start, end + 1);
}

export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function parseDialogueTurn(text: string): DialogueTurn | null {
  const jsonText = extractJsonObject(text);
  if (!jsonText) return null;
  const parsed = DialogueTurnSchema.safeParse(safeJsonParse(jsonText));
  return parsed.success ? parsed.data : null;
}
