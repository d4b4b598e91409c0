import type { Change } from "../client/types.js";
import type { DeviceSummary } from "./types.js";

const LABEL_WIDTH = 8;

export function renderSummary(summary: DeviceSummary): string {
  return [
    renderLine("brand", summary.brand),
    renderLine("model", summary.model),
    renderLine("serial", summary.serial ?? "-"),
  ].join("\n");
}

export function renderChange(change: Change): string {
  const line = `${change.id}  ${change.status}  ${change.summary}`.trimEnd();
  if (!change.err) {
    return line;
  }
  return `${line}\nerror: ${change.err}`;
}

function renderLine(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`;
}
