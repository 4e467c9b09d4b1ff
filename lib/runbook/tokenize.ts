/**
 * Markdown → structural event stream.
 *
 * The compiler folds a flat stream of start/end/text events. This adapter
 * produces that stream from remark's mdast (CommonMark + GFM + frontmatter)
 * with a depth-first walk, so the compiler never sees the tree.
 *
 * Differences from a plain tree walk worth knowing about:
 * - Paragraphs directly inside items of a tight list are unwrapped (no
 *   paragraph start/end), so list text stays compact.
 * - A fenced block that is still open when the input ends yields no
 *   `codeEnd`; the compiler then drops it instead of making a step.
 * - GFM tables are flattened into a single paragraph of ` | ` joined cells.
 */

import type { Code, Nodes, Root } from "mdast";
import { remark } from "remark";
import remarkFrontmatter from "remark-frontmatter";
import remarkGfm from "remark-gfm";
import type { HeadingLevel } from "./model.ts";

export type FenceKind =
  | { readonly kind: "fenced"; readonly lang: string }
  | { readonly kind: "indented" };

export type TokenEvent =
  | { kind: "headingStart"; level: HeadingLevel; line?: number }
  | { kind: "headingEnd" }
  | { kind: "codeStart"; fence: FenceKind; line?: number }
  | { kind: "codeEnd" }
  | { kind: "text"; text: string }
  | { kind: "inlineCode"; code: string }
  | { kind: "softBreak" }
  | { kind: "hardBreak" }
  | { kind: "paragraphStart"; line?: number }
  | { kind: "paragraphEnd" }
  | { kind: "listStart"; ordered: boolean }
  | { kind: "listEnd" }
  | { kind: "itemStart" }
  | { kind: "itemEnd" }
  | { kind: "emphasisStart" }
  | { kind: "emphasisEnd" }
  | { kind: "strongStart" }
  | { kind: "strongEnd" }
  | { kind: "other"; type: string };

interface WalkContext {
  readonly source: string;
  readonly tightList: boolean;
}

export function parseMarkdown(source: string): Root {
  return remark().use(remarkFrontmatter).use(remarkGfm).parse(source);
}

export function* tokenize(source: string): Generator<TokenEvent, void, unknown> {
  yield* treeEvents(parseMarkdown(source), source);
}

export function* treeEvents(
  tree: Root,
  source: string,
): Generator<TokenEvent, void, unknown> {
  const ctx: WalkContext = { source, tightList: false };
  for (const node of tree.children) yield* walk(node, ctx);
}

function* children(
  node: { children: Nodes[] },
  ctx: WalkContext,
): Generator<TokenEvent, void, unknown> {
  for (const child of node.children) yield* walk(child, ctx);
}

function* walk(
  node: Nodes,
  ctx: WalkContext,
): Generator<TokenEvent, void, unknown> {
  switch (node.type) {
    case "heading":
      yield {
        kind: "headingStart",
        level: node.depth,
        line: node.position?.start.line,
      };
      yield* children(node, ctx);
      yield { kind: "headingEnd" };
      return;

    case "paragraph":
      if (ctx.tightList) {
        yield* children(node, ctx);
        return;
      }
      yield { kind: "paragraphStart", line: node.position?.start.line };
      yield* children(node, ctx);
      yield { kind: "paragraphEnd" };
      return;

    case "text": {
      const parts = node.value.split(/\r?\n/);
      for (let i = 0; i < parts.length; i++) {
        if (i > 0) yield { kind: "softBreak" };
        if (parts[i].length) yield { kind: "text", text: parts[i] };
      }
      return;
    }

    case "break":
      yield { kind: "hardBreak" };
      return;

    case "inlineCode":
      yield { kind: "inlineCode", code: node.value };
      return;

    case "emphasis":
      yield { kind: "emphasisStart" };
      yield* children(node, ctx);
      yield { kind: "emphasisEnd" };
      return;

    case "strong":
      yield { kind: "strongStart" };
      yield* children(node, ctx);
      yield { kind: "strongEnd" };
      return;

    case "list": {
      yield { kind: "listStart", ordered: node.ordered ?? false };
      const itemCtx: WalkContext = { ...ctx, tightList: !node.spread };
      for (const item of node.children) yield* walk(item, itemCtx);
      yield { kind: "listEnd" };
      return;
    }

    case "listItem":
      yield { kind: "itemStart" };
      if (typeof node.checked === "boolean") {
        yield { kind: "text", text: node.checked ? "[x] " : "[ ] " };
      }
      yield* children(node, ctx);
      yield { kind: "itemEnd" };
      return;

    case "code":
      yield* codeEvents(node, ctx);
      return;

    case "table":
      yield { kind: "paragraphStart", line: node.position?.start.line };
      for (const [r, row] of node.children.entries()) {
        if (r > 0) yield { kind: "hardBreak" };
        for (const [c, cell] of row.children.entries()) {
          if (c > 0) yield { kind: "text", text: " | " };
          yield* children(cell, ctx);
        }
      }
      yield { kind: "paragraphEnd" };
      return;

    case "image":
    case "imageReference":
      if (node.alt) yield { kind: "text", text: node.alt };
      return;

    case "blockquote":
    case "link":
    case "linkReference":
    case "delete":
      yield* children(node, { ...ctx, tightList: false });
      return;

    default:
      yield { kind: "other", type: node.type };
  }
}

const openingFence = /^ {0,3}(`{3,}|~{3,})/;
const closingFence = /^([ >]*)(`{3,}|~{3,})[ \t]*$/;
const containerMarkers = /^(?: {0,3}(?:>[ ]?|(?:[-+*]|\d{1,9}[.)])[ ]+))*/;

export function fenceOf(node: Code, source: string): FenceKind {
  const start = node.position?.start.offset;
  if (start === undefined) return { kind: "fenced", lang: node.lang ?? "" };
  return openingFence.test(source.slice(start))
    ? { kind: "fenced", lang: node.lang ?? "" }
    : { kind: "indented" };
}

/** Columns taken by blockquote and list markers before the block opens. */
function containerIndent(source: string, start: number): number {
  const lineStart = source.lastIndexOf("\n", start - 1) + 1;
  const prefix = source.slice(lineStart, start);
  return containerMarkers.exec(prefix)?.[0].length ?? 0;
}

/**
 * A fenced block is unterminated when it runs to the end of the input and its
 * last line is not a closing fence matching the opener. A closing fence is
 * the opener's character, at least as long, indented at most three columns
 * past its container.
 */
export function isUnterminatedFence(node: Code, source: string): boolean {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  if (start === undefined || end === undefined) return false;
  if (end < source.trimEnd().length) return false;

  const lines = source.slice(start, end).replace(/\r?\n$/, "").split(
    /\r?\n/,
  );
  const open = openingFence.exec(lines[0]);
  if (!open) return false;
  if (lines.length < 2) return true;
  const close = closingFence.exec(lines[lines.length - 1]);
  if (!close) return true;
  const indent = close[1].length - containerIndent(source, start);
  return !(indent >= 0 && indent <= 3 && close[2][0] === open[1][0] &&
    close[2].length >= open[1].length);
}

function* codeEvents(
  node: Code,
  ctx: WalkContext,
): Generator<TokenEvent, void, unknown> {
  const fence = fenceOf(node, ctx.source);
  yield { kind: "codeStart", fence, line: node.position?.start.line };
  if (node.value.length) yield { kind: "text", text: `${node.value}\n` };
  if (fence.kind === "indented" || !isUnterminatedFence(node, ctx.source)) {
    yield { kind: "codeEnd" };
  }
}
