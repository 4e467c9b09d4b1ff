/**
 * Rendered-line layout of a runbook.
 *
 * Both the full-screen viewer and the navigator's scroll replay consume this
 * one generator, so the line a step is painted on and the line the navigator
 * scrolls to are always the same number.
 *
 * Per section header: blank, header, blank. Per text block: its content lines
 * then a blank. Per code block: a step header, its content lines, a blank.
 */

import {
  type CodeBlock,
  contentLines,
  type HeadingLevel,
  type RunbookDocument,
} from "./model.ts";

export type LayoutLine =
  | { readonly kind: "blank" }
  | {
    readonly kind: "header";
    readonly text: string;
    readonly level: HeadingLevel;
    readonly sectionIndex: number;
  }
  | { readonly kind: "text"; readonly text: string }
  | {
    readonly kind: "step-header";
    readonly step: number;
    readonly code: CodeBlock;
  }
  | {
    readonly kind: "code";
    readonly step: number;
    readonly text: string;
    readonly code: CodeBlock;
  };

const blank: LayoutLine = Object.freeze({ kind: "blank" });

export function* layout(
  doc: RunbookDocument,
): Generator<LayoutLine, void, unknown> {
  let step = 0;
  for (const [sectionIndex, section] of doc.sections.entries()) {
    if (section.header !== undefined) {
      yield blank;
      yield {
        kind: "header",
        text: section.header,
        level: section.headerLevel ?? 1,
        sectionIndex,
      };
      yield blank;
    }

    for (const block of section.blocks) {
      if (block.kind === "text") {
        for (const text of contentLines(block.text)) {
          yield { kind: "text", text };
        }
        yield blank;
        continue;
      }

      step++;
      const code = block.code;
      yield { kind: "step-header", step, code };
      for (const text of contentLines(code.content)) {
        yield { kind: "code", step, text, code };
      }
      yield blank;
    }
  }
}

/** Materialized layout, for callers that need random access. */
export function layoutLines(doc: RunbookDocument): LayoutLine[] {
  return Array.from(layout(doc));
}
