/**
 * Runbook document model.
 *
 * A compiled runbook is a flat, source-ordered list of sections. Each section
 * optionally starts with a heading and owns an ordered list of blocks, either
 * documentation text or a language-tagged code block. Heading levels are
 * metadata only; sections never nest.
 *
 * The "step index" is not stored anywhere. `steps()` derives it on demand by
 * flattening every section's code blocks in document order, so there is one
 * source of truth (the sections) and step numbers are 1-based positions into
 * that derived list.
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** An executable fenced block. Only tagged fences become code blocks. */
export interface CodeBlock {
  readonly language: string;
  readonly content: string; // leading whitespace kept, trailing trimmed
  readonly line: number; // 1-based line where the fence opened
}

export type Block =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "code"; readonly code: CodeBlock };

export interface Section {
  readonly header?: string;
  readonly headerLevel?: HeadingLevel;
  readonly blocks: readonly Block[];
}

export interface RunbookDocument {
  readonly sections: readonly Section[];
}

export function isHeadingLevel(n: number): n is HeadingLevel {
  return Number.isInteger(n) && n >= 1 && n <= 6;
}

/** All executable steps, in document order. */
export function steps(doc: RunbookDocument): readonly CodeBlock[] {
  const result: CodeBlock[] = [];
  for (const section of doc.sections) {
    for (const block of section.blocks) {
      if (block.kind === "code") result.push(block.code);
    }
  }
  return result;
}

export function stepCount(doc: RunbookDocument): number {
  return steps(doc).length;
}

/**
 * Split content into display lines: LF or CRLF separated, and a trailing line
 * ending does not start another (empty) line.
 */
export function contentLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

const interpreters: Record<string, string> = {
  bash: "bash",
  sh: "sh",
  python: "python3",
  python3: "python3",
  ruby: "ruby",
  perl: "perl",
  zsh: "zsh",
  fish: "fish",
};

/** Interpreter command for a step's language; unknown languages fall back to bash. */
export function interpreterFor(code: CodeBlock): string {
  return Object.hasOwn(interpreters, code.language)
    ? interpreters[code.language]
    : "bash";
}

export function isShell(code: CodeBlock): boolean {
  return ["bash", "sh", "zsh", "fish"].includes(code.language);
}

const dangerousPatterns = [
  "rm -rf",
  "drop table",
  "drop database",
  "delete ",
  "--force",
];

/** True when the step's content looks destructive (case-insensitive). */
export function isDangerous(code: CodeBlock): boolean {
  const lower = code.content.toLowerCase();
  return dangerousPatterns.some((p) => lower.includes(p));
}
