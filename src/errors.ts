// src/errors.ts
import type { Action, ActionKind } from "./plan.js";

/** Bad roots. Raised before anything is scanned. */
export class FatalSetupError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FatalSetupError";
  }
}

export class DigestError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = "DigestError";
  }
}

export type ScanWarning = {
  root: string;
  // "" when the failure is on the root itself
  relativePath: string;
  message: string;
  code?: string;
};

export type ComparisonWarning = {
  relativePath: string;
  message: string;
};

export type ActionError = {
  action: Action;
  kind: ActionKind;
  relativePath: string;
  message: string;
  code?: string;
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

export function isMissing(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}
