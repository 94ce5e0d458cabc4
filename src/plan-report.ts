// src/plan-report.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { PLAN_SAMPLE_LIMIT } from "./defaults.js";
import type { ActionError } from "./errors.js";
import { plannedBytes } from "./executor.js";
import type { Action, Plan } from "./plan.js";
import { formatBytes } from "./progress.js";

const LABELS: Record<Action["kind"], string> = {
  add: "[ADD   ]",
  update: "[UPDATE]",
  delete: "[DELETE]",
};

function isDirectoryAction(a: Action): boolean {
  return a.kind === "delete"
    ? a.targetEntry.isDirectory
    : a.sourceEntry.isDirectory;
}

export function formatAction(a: Action): string {
  const suffix = isDirectoryAction(a) ? "/" : "";
  return `${LABELS[a.kind]} ${a.relativePath}${suffix}`;
}

/** The first `limit` actions, one per line, plus a "... and N more" tail. */
export function sampleActions(
  plan: Plan,
  limit = PLAN_SAMPLE_LIMIT,
): string[] {
  const lines = plan.actions.slice(0, limit).map((a) => `  ${formatAction(a)}`);
  const rest = plan.actions.length - limit;
  if (rest > 0) {
    lines.push(`  ... and ${rest} more action${rest === 1 ? "" : "s"}`);
  }
  return lines;
}

export function renderPlanSummary(
  plan: Plan,
  { limit = PLAN_SAMPLE_LIMIT }: { limit?: number } = {},
): string {
  const table = new AsciiTable3("Sync Plan")
    .setHeading("Action", "Count")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  table.setAlign(2, AlignmentEnum.RIGHT);
  table.addRow("add", plan.adds);
  table.addRow("update", plan.updates);
  table.addRow("delete", plan.deletes);
  table.addRow("bytes to copy", formatBytes(plannedBytes(plan)));

  const out = [table.toString().trimEnd()];
  if (plan.actions.length) {
    out.push("Sample actions:", ...sampleActions(plan, limit));
  }
  return out.join("\n");
}

export function renderApplyErrors(errors: readonly ActionError[]): string {
  if (!errors.length) return "";
  return [
    `synchronization finished with ${errors.length} error(s):`,
    ...errors.map((e) => `- ${e.message}`),
  ].join("\n");
}
