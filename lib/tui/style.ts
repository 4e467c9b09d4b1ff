/**
 * Presentation helpers shared by the walker and the viewer: callout
 * detection for prose lines, danger and variable highlighting for shell code,
 * heading styles and step markers. Every function takes a picocolors
 * `Colors` instance so `--no-color` is honored by construction.
 */

import type { HeadingLevel } from "../runbook/model.ts";
import type { Colors } from "../universal/logger.ts";

export const icons = {
  done: "✅",
  current: "➡️",
  pending: "🔘",
  warning: "⚠️",
  danger: "🔥",
  info: "ℹ️",
} as const;

export type Callout = "warning" | "danger" | "info";

export type StepState = "done" | "current" | "pending";

export function calloutOf(line: string): Callout | undefined {
  if (line.includes("WARNING")) return "warning";
  if (line.includes("DANGER") || line.includes("CRITICAL")) return "danger";
  if (line.includes("INFO") || line.includes("NOTE")) return "info";
  return undefined;
}

export function styleTextLine(line: string, c: Colors) {
  switch (calloutOf(line)) {
    case "warning":
      return `${icons.warning} ${c.bold(c.yellow(line))}`;
    case "danger":
      return `${icons.danger} ${c.bold(c.red(line))}`;
    case "info":
      return `${icons.info} ${c.blue(line)}`;
    default:
      return line;
  }
}

export function isDangerousLine(line: string) {
  return line.includes("rm ") || line.includes("delete") ||
    line.includes("drop") || line.includes("--force");
}

const SHELL_VAR = /\$(?:\{[^}]*\}|[A-Za-z_][A-Za-z0-9_]*)/g;

/** Comment, danger and `$VAR` highlighting for bash/sh; plain green otherwise. */
export function highlightCodeLine(line: string, language: string, c: Colors) {
  if (language !== "bash" && language !== "sh") return c.green(line);
  if (line.trimStart().startsWith("#")) return c.gray(c.italic(line));
  if (isDangerousLine(line)) return c.red(line);

  let out = "";
  let last = 0;
  for (const m of line.matchAll(SHELL_VAR)) {
    const at = m.index ?? 0;
    if (at > last) out += c.green(line.slice(last, at));
    out += c.bold(c.cyan(m[0]));
    last = at + m[0].length;
  }
  if (last < line.length) out += c.green(line.slice(last));
  return out;
}

export function headingText(text: string, level: HeadingLevel) {
  return `📘 ${"#".repeat(level)} ${text}`;
}

export function styleHeading(text: string, level: HeadingLevel, c: Colors) {
  const shown = headingText(text, level);
  if (level === 1) return c.bold(c.underline(c.cyan(shown)));
  if (level === 2) return c.bold(c.magenta(shown));
  return c.gray(shown);
}

export function stepState(step: number, current: number): StepState {
  if (step < current) return "done";
  if (step === current) return "current";
  return "pending";
}

/** Cut `text` to `width` code points, marking the cut with an ellipsis. */
export function clip(text: string, width: number) {
  if (width <= 0) return "";
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  return chars.slice(0, width - 1).join("") + "…";
}
