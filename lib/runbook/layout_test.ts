import assert from "node:assert/strict";
import { test } from "node:test";
import { compileMarkdown } from "./compile.ts";
import { layoutLines } from "./layout.ts";

test("layout", async (t) => {
  const doc = compileMarkdown(
    "# Intro\n\nHello\nworld\n\n```bash\na\nb\n```\n",
  );

  await t.test("header, text and step lines in render order", () => {
    const lines = layoutLines(doc);
    assert.deepEqual(lines.map((l) => l.kind), [
      "blank",
      "header",
      "blank",
      "text",
      "blank",
      "step-header",
      "code",
      "code",
      "blank",
    ]);
    assert.deepEqual(lines[3], { kind: "text", text: "Hello world" });
    const code = lines.filter((l) => l.kind === "code").map((l) =>
      l.kind === "code" ? `${l.step}:${l.text}` : ""
    );
    assert.deepEqual(code, ["1:a", "1:b"]);
  });

  await t.test("a leading section without a header has no header lines", () => {
    const lines = layoutLines(compileMarkdown("Just prose.\n"));
    assert.deepEqual(lines, [{ kind: "text", text: "Just prose." }, { kind: "blank" }]);
  });

  await t.test("steps are numbered across sections", () => {
    const lines = layoutLines(
      compileMarkdown("# A\n\n```sh\nx\n```\n\n# B\n\n```sh\ny\n```\n"),
    );
    const headers = lines.flatMap((l) => l.kind === "step-header" ? [l.step] : []);
    assert.deepEqual(headers, [1, 2]);
    assert.equal(lines.length, 3 + 3 + 3 + 3);
  });

  await t.test("empty document renders nothing", () => {
    assert.deepEqual(layoutLines(compileMarkdown("")), []);
  });
});
