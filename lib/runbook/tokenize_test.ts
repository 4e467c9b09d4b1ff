import assert from "node:assert/strict";
import { test } from "node:test";
import { type TokenEvent, tokenize } from "./tokenize.ts";

const events = (md: string): TokenEvent[] => Array.from(tokenize(md));

test("tokenize", async (t) => {
  await t.test("headings and paragraphs carry source lines", () => {
    assert.deepEqual(events("# Title\n\nHello\n"), [
      { kind: "headingStart", level: 1, line: 1 },
      { kind: "text", text: "Title" },
      { kind: "headingEnd" },
      { kind: "paragraphStart", line: 3 },
      { kind: "text", text: "Hello" },
      { kind: "paragraphEnd" },
    ]);
  });

  await t.test("soft line breaks inside a paragraph", () => {
    assert.deepEqual(events("one\ntwo\n"), [
      { kind: "paragraphStart", line: 1 },
      { kind: "text", text: "one" },
      { kind: "softBreak" },
      { kind: "text", text: "two" },
      { kind: "paragraphEnd" },
    ]);
  });

  await t.test("fenced code with a language tag and info string", () => {
    assert.deepEqual(events("```bash title=deploy\necho hi\n```\n"), [
      { kind: "codeStart", fence: { kind: "fenced", lang: "bash" }, line: 1 },
      { kind: "text", text: "echo hi\n" },
      { kind: "codeEnd" },
    ]);
  });

  await t.test("tilde fences and untagged fences", () => {
    assert.deepEqual(events("~~~python\nprint(1)\n~~~\n\n```\nplain\n```\n"), [
      { kind: "codeStart", fence: { kind: "fenced", lang: "python" }, line: 1 },
      { kind: "text", text: "print(1)\n" },
      { kind: "codeEnd" },
      { kind: "codeStart", fence: { kind: "fenced", lang: "" }, line: 5 },
      { kind: "text", text: "plain\n" },
      { kind: "codeEnd" },
    ]);
  });

  await t.test("indented code is reported as indented", () => {
    const evs = events("Intro\n\n    indented\n");
    assert.deepEqual(evs.slice(3), [
      { kind: "codeStart", fence: { kind: "indented" }, line: 3 },
      { kind: "text", text: "indented\n" },
      { kind: "codeEnd" },
    ]);
  });

  await t.test("a fence still open at end of input has no end event", () => {
    assert.deepEqual(events("```sh\nls\n"), [
      { kind: "codeStart", fence: { kind: "fenced", lang: "sh" }, line: 1 },
      { kind: "text", text: "ls\n" },
    ]);
  });

  await t.test("a closing fence indented four spaces is content", () => {
    assert.deepEqual(events("```bash\necho hi\n    ```\n"), [
      { kind: "codeStart", fence: { kind: "fenced", lang: "bash" }, line: 1 },
      { kind: "text", text: "echo hi\n    ```\n" },
    ]);
  });

  await t.test("tight task lists unwrap paragraphs", () => {
    assert.deepEqual(events("- [x] done\n- [ ] todo\n"), [
      { kind: "listStart", ordered: false },
      { kind: "itemStart" },
      { kind: "text", text: "[x] " },
      { kind: "text", text: "done" },
      { kind: "itemEnd" },
      { kind: "itemStart" },
      { kind: "text", text: "[ ] " },
      { kind: "text", text: "todo" },
      { kind: "itemEnd" },
      { kind: "listEnd" },
    ]);
  });

  await t.test("inline markup", () => {
    assert.deepEqual(events("Run `make` *now*, **fast**.\n"), [
      { kind: "paragraphStart", line: 1 },
      { kind: "text", text: "Run " },
      { kind: "inlineCode", code: "make" },
      { kind: "text", text: " " },
      { kind: "emphasisStart" },
      { kind: "text", text: "now" },
      { kind: "emphasisEnd" },
      { kind: "text", text: ", " },
      { kind: "strongStart" },
      { kind: "text", text: "fast" },
      { kind: "strongEnd" },
      { kind: "text", text: "." },
      { kind: "paragraphEnd" },
    ]);
  });

  await t.test("tables flatten into one paragraph", () => {
    assert.deepEqual(events("| a | b |\n| - | - |\n| 1 | 2 |\n"), [
      { kind: "paragraphStart", line: 1 },
      { kind: "text", text: "a" },
      { kind: "text", text: " | " },
      { kind: "text", text: "b" },
      { kind: "hardBreak" },
      { kind: "text", text: "1" },
      { kind: "text", text: " | " },
      { kind: "text", text: "2" },
      { kind: "paragraphEnd" },
    ]);
  });

  await t.test("frontmatter and thematic breaks are opaque", () => {
    assert.deepEqual(events("---\ntitle: t\n---\n\n***\n"), [
      { kind: "other", type: "yaml" },
      { kind: "other", type: "thematicBreak" },
    ]);
  });
});
