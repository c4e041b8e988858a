// packages/app-cli/src/cli.ts
import readline from "node:readline";

export function makeCli(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
  return readline.createInterface({ input, output, terminal: false });
}

export async function typewriterPrint(text: string, delayMs: number, out: NodeJS.WritableStream = process.stdout) {
  if (!delayMs || delayMs <= 0) {
    out.write(text + "\n");
    return;
  }
  for (const ch of text) {
    out.write(ch);
    await new Promise((r) => setTimeout(r, delayMs));
  }
  out.write("\n");
}
