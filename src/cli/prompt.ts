// src/cli/prompt.ts

import readline from "readline";

import type { ConflictChoice, ConflictContext, ConflictStrategy } from "../core/output-path";

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function parseConflictAnswer(
  answer: string,
  ctx: ConflictContext,
): ConflictChoice | null {
  switch (answer.trim()) {
    case "1":
      return { kind: "overwrite" };
    case "2":
      return { kind: "rename", path: ctx.suggestedPath };
    case "3":
      return { kind: "abort" };
    default:
      return null;
  }
}

/**
 * Ask on the terminal until one of the three choices is entered.
 * Ctrl+C or end of input counts as abort.
 */
export function createPromptStrategy(
  io: PromptIO = { input: process.stdin, output: process.stdout },
): ConflictStrategy {
  return {
    ask: (ctx) =>
      new Promise<ConflictChoice>((resolve) => {
        const rl = readline.createInterface({ input: io.input, output: io.output });
        let settled = false;

        const finish = (choice: ConflictChoice) => {
          if (settled) return;
          settled = true;
          rl.close();
          resolve(choice);
        };

        rl.on("SIGINT", () => finish({ kind: "abort" }));
        rl.on("close", () => finish({ kind: "abort" }));

        const askOnce = () => {
          io.output.write(
            "\nOutput file already exists. Choose an option:\n" +
              "1. Overwrite existing file\n" +
              `2. Use alternative filename: ${ctx.suggestedPath}\n` +
              "3. Stop processing\n",
          );
          rl.question("Enter your choice (1/2/3): ", (answer) => {
            const choice = parseConflictAnswer(answer, ctx);
            if (choice) {
              finish(choice);
              return;
            }
            io.output.write("Invalid choice. Please enter 1, 2, or 3.\n");
            askOnce();
          });
        };

        askOnce();
      }),
  };
}
