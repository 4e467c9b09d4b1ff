/**
 * Document compiler: folds a tokenizer event stream into a RunbookDocument.
 *
 * The fold keeps one text accumulator plus an explicit parse mode; heading
 * text and code bodies live inside their mode so "in heading" and "in code"
 * can never both be true. The compiler is total: any event order, including
 * unmatched starts at end of stream, yields a well-formed document.
 *
 * - Every heading starts a new flat section (levels are metadata only).
 * - Fenced blocks with a language tag become steps; untagged or indented
 *   blocks are re-wrapped in ``` fences and kept as documentation text.
 * - A code block that never receives its end event is dropped.
 * - Sections with neither a header nor blocks are not emitted.
 */

import type {
  Block,
  CodeBlock,
  HeadingLevel,
  RunbookDocument,
  Section,
} from "./model.ts";
import { type TokenEvent, tokenize } from "./tokenize.ts";

type ParseMode =
  | { readonly kind: "neutral" }
  | { readonly kind: "heading"; readonly level: HeadingLevel; text: string }
  | {
    readonly kind: "code";
    readonly lang: string;
    readonly line: number;
    buffer: string;
  };

interface SectionDraft {
  readonly header?: string;
  readonly headerLevel?: HeadingLevel;
  readonly blocks: Block[];
}

const BULLET = "• ";

function hasContent(draft: SectionDraft) {
  return draft.blocks.length > 0 || draft.header !== undefined;
}

function freezeSection(draft: SectionDraft): Section {
  return Object.freeze({
    ...draft,
    blocks: Object.freeze([...draft.blocks]),
  });
}

export function compile(events: Iterable<TokenEvent>): RunbookDocument {
  const sections: Section[] = [];
  let current: SectionDraft = { blocks: [] };
  let mode: ParseMode = { kind: "neutral" };
  let text = "";
  let line = 1;

  const append = (s: string) => {
    if (mode.kind === "heading") mode.text += s;
    else text += s;
  };

  const flushText = () => {
    if (text.trim().length > 0) current.blocks.push({ kind: "text", text });
    text = "";
  };

  const closeHeading = (heading: Extract<ParseMode, { kind: "heading" }>) => {
    if (hasContent(current)) sections.push(freezeSection(current));
    current = {
      header: heading.text.trim(),
      headerLevel: heading.level,
      blocks: [],
    };
    mode = { kind: "neutral" };
  };

  for (const ev of events) {
    switch (ev.kind) {
      case "headingStart":
        if (ev.line !== undefined) line = ev.line;
        flushText();
        // an open code block here never closed; it is abandoned
        mode = { kind: "heading", level: ev.level, text: "" };
        break;

      case "headingEnd":
        if (mode.kind === "heading") closeHeading(mode);
        break;

      case "codeStart":
        if (ev.line !== undefined) line = ev.line;
        if (mode.kind === "heading") closeHeading(mode);
        flushText();
        mode = {
          kind: "code",
          lang: ev.fence.kind === "fenced" ? ev.fence.lang : "",
          line,
          buffer: "",
        };
        break;

      case "codeEnd":
        if (mode.kind !== "code") break;
        if (mode.lang.length > 0) {
          const code: CodeBlock = Object.freeze({
            language: mode.lang,
            content: mode.buffer.trimEnd(),
            line: mode.line,
          });
          const block: Block = { kind: "code", code };
          current.blocks.push(Object.freeze(block));
        } else if (mode.buffer.trim().length > 0) {
          text += "```\n" + mode.buffer + "```\n";
        }
        mode = { kind: "neutral" };
        break;

      case "text":
        if (mode.kind === "code") mode.buffer += ev.text;
        else append(ev.text);
        break;

      case "inlineCode":
        if (mode.kind !== "code") append("`" + ev.code + "`");
        break;

      case "softBreak":
        if (mode.kind === "code") {
          mode.buffer += "\n";
          line++;
        } else if (mode.kind === "neutral") {
          text += " ";
        }
        break;

      case "hardBreak":
        if (mode.kind === "code") mode.buffer += "\n";
        else append("\n");
        line++;
        break;

      case "paragraphStart":
        if (ev.line !== undefined) line = ev.line;
        if (text.length > 0 && !text.endsWith("\n")) text += "\n";
        break;

      case "paragraphEnd":
      case "listStart":
      case "listEnd":
      case "itemEnd":
        append("\n");
        break;

      case "itemStart":
        append(BULLET);
        break;

      case "emphasisStart":
      case "emphasisEnd":
        append("*");
        break;

      case "strongStart":
      case "strongEnd":
        append("**");
        break;

      case "other":
        break;
    }
  }

  // a heading that never ended keeps its words as documentation
  if (mode.kind === "heading") text += mode.text;
  flushText();
  if (hasContent(current)) sections.push(freezeSection(current));

  return Object.freeze({ sections: Object.freeze(sections) });
}

/** Tokenize and compile Markdown source in one step. */
export function compileMarkdown(source: string): RunbookDocument {
  return compile(tokenize(source));
}
