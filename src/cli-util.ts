// src/cli-util.ts
import { Command, InvalidArgumentError } from "commander";
import { FatalSetupError } from "./errors.js";

/** commander argParser for options like `--concurrency <n>`. */
export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

export function fatalMessage(label: string, err: unknown): string {
  if (err instanceof FatalSetupError) return `${label} fatal: ${err.message}`;
  if (err instanceof Error) return `${label} fatal:\n${err.stack ?? err.message}`;
  return `${label} fatal: ${String(err)}`;
}

/**
 * Parse argv and run the program's action. A thrown error is printed as
 * "<label> fatal: ..." and turns into exit code 1.
 */
export async function cliMain(
  program: Command,
  argv: string[] = process.argv,
): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (err) {
    console.error(fatalMessage(program.name() || "command", err));
    process.exitCode = 1;
  }
}
