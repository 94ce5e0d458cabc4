// src/confirm.ts
import readline from "node:readline";

export type Confirm = (question: string) => Promise<boolean>;

/** Only an explicit "y"/"yes" accepts; an empty answer declines. */
export function isAffirmative(answer: string | null | undefined): boolean {
  const normalized = (answer ?? "").trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Ask on `output` and read one line from `input`. End of input before a line
 * arrives counts as "no".
 */
export function promptConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Confirm {
  return (question) =>
    new Promise<boolean>((resolve) => {
      const rl = readline.createInterface({ input, output, terminal: false });
      let answered = false;
      rl.once("line", (line) => {
        answered = true;
        rl.close();
        resolve(isAffirmative(line));
      });
      rl.once("close", () => {
        if (!answered) resolve(false);
      });
      output.write(`${question} [y/N]: `);
    });
}
