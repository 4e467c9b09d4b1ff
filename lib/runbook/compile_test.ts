import assert from "node:assert/strict";
import { test } from "node:test";
import { compile, compileMarkdown } from "./compile.ts";
import { stepCount, steps } from "./model.ts";

const basicExample = `# Basic Example

Check the host first.

\`\`\`bash
uptime
\`\`\`

\`\`\`bash
df -h
\`\`\`

\`\`\`bash
free -m
\`\`\`

Then restart.

\`\`\`bash
systemctl restart app
\`\`\`

\`\`\`python
print("done")
\`\`\`
`;

test("compile", async (t) => {
  await t.test("one header, four bash steps and one python step", () => {
    const doc = compileMarkdown(basicExample);
    assert.equal(doc.sections.length, 1);
    assert.equal(doc.sections[0].header, "Basic Example");
    assert.equal(doc.sections[0].headerLevel, 1);
    assert.equal(stepCount(doc), 5);
    const all = steps(doc);
    assert.equal(all[0].language, "bash");
    assert.equal(all[0].content, "uptime");
    assert.equal(all[0].line, 5);
    assert.equal(all[4].language, "python");
    assert.equal(all[4].content, 'print("done")');
    assert.deepEqual(doc.sections[0].blocks[0], {
      kind: "text",
      text: "Check the host first.\n",
    });
  });

  await t.test("levels 1 and 2 start flat sections", () => {
    const doc = compileMarkdown(
      "# One\n\n```bash\na\n```\n\n## Two\n\n```sh\nb\n```\n",
    );
    assert.equal(doc.sections.length, 2);
    assert.equal(stepCount(doc), 2);
    assert.equal(doc.sections[1].header, "Two");
    assert.equal(doc.sections[1].headerLevel, 2);
  });

  await t.test("H1 to H4 with two code blocks and leading prose", () => {
    const doc = compileMarkdown(
      "Intro text\n\n# H1\n\n```bash\nx\n```\n\n## H2\n\n### H3\n\n```python\ny\n```\n\n#### H4\n",
    );
    assert.equal(doc.sections.length, 5);
    assert.deepEqual(doc.sections.map((s) => s.header), [
      undefined,
      "H1",
      "H2",
      "H3",
      "H4",
    ]);
    assert.deepEqual(doc.sections.map((s) => s.blocks.length), [1, 1, 0, 1, 0]);
    assert.equal(stepCount(doc), 2);
  });

  await t.test("an unterminated fence contributes no step", () => {
    const doc = compileMarkdown(
      "# Setup\n\n```bash\necho ok\n```\n\n## Broken\n\nText\n\n```bash\nnever closed\n",
    );
    assert.equal(stepCount(doc), 1);
    assert.equal(doc.sections.length, 2);
    assert.deepEqual(doc.sections[1], {
      header: "Broken",
      headerLevel: 2,
      blocks: [{ kind: "text", text: "Text\n" }],
    });
  });

  await t.test("a closing fence indented four spaces does not close", () => {
    const doc = compileMarkdown("# T\n\n```bash\necho hi\n    ```\n");
    assert.equal(stepCount(doc), 0);
    assert.deepEqual(doc.sections, [
      { header: "T", headerLevel: 1, blocks: [] },
    ]);
  });

  await t.test("a closing fence indented three spaces closes", () => {
    const doc = compileMarkdown("# T\n\n```bash\necho hi\n   ```\n");
    assert.equal(stepCount(doc), 1);
    assert.equal(steps(doc)[0].content, "echo hi");
  });

  await t.test("a fence closed by the other fence character is unterminated", () => {
    assert.equal(stepCount(compileMarkdown("```bash\nx\n~~~\n")), 0);
    assert.equal(stepCount(compileMarkdown("~~~bash\nx\n```\n")), 0);
  });

  await t.test("a fence inside a list item closes at the item's indent", () => {
    const doc = compileMarkdown("- ```bash\n  uptime\n  ```\n");
    assert.equal(stepCount(doc), 1);
    assert.equal(steps(doc)[0].content, "uptime");
  });

  await t.test("empty and whitespace-only input", () => {
    for (const src of ["", "   \n\t\n  ", "\n\n\n"]) {
      const doc = compileMarkdown(src);
      assert.equal(doc.sections.length, 0);
      assert.equal(stepCount(doc), 0);
    }
  });

  await t.test("untagged fences stay visible as text", () => {
    const doc = compileMarkdown("Intro\n\n```\nplain block\n```\n");
    assert.equal(stepCount(doc), 0);
    assert.deepEqual(doc.sections[0].blocks, [
      { kind: "text", text: "Intro\n" },
      { kind: "text", text: "```\nplain block\n```\n" },
    ]);
  });

  await t.test("an empty heading still opens a section", () => {
    const doc = compileMarkdown("Text\n\n## \n\nMore\n");
    assert.equal(doc.sections.length, 2);
    assert.equal(doc.sections[1].header, "");
    assert.deepEqual(doc.sections[1].blocks, [{ kind: "text", text: "More\n" }]);
  });

  await t.test("lists, inline markup and soft breaks", () => {
    const doc = compileMarkdown(
      "Run `make` *now* and **fast**.\nSecond line.\n\n- one\n- two\n",
    );
    assert.deepEqual(doc.sections[0].blocks, [{
      kind: "text",
      text: "Run `make` *now* and **fast**. Second line.\n\n• one\n• two\n\n",
    }]);
  });

  await t.test("heading text keeps inline markup", () => {
    const doc = compileMarkdown("## Restart `nginx` *safely*\n");
    assert.equal(doc.sections[0].header, "Restart `nginx` *safely*");
  });

  await t.test("out-of-order events still fold into a document", async (t) => {
    await t.test("a heading abandons an open code block", () => {
      const doc = compile([
        { kind: "codeStart", fence: { kind: "fenced", lang: "bash" } },
        { kind: "text", text: "a\n" },
        { kind: "headingStart", level: 1 },
        { kind: "text", text: "H" },
        { kind: "headingEnd" },
        { kind: "codeEnd" },
      ]);
      assert.deepEqual(doc.sections, [{ header: "H", headerLevel: 1, blocks: [] }]);
    });

    await t.test("code inside a heading closes the heading first", () => {
      const doc = compile([
        { kind: "headingStart", level: 3 },
        { kind: "text", text: "A" },
        { kind: "codeStart", fence: { kind: "fenced", lang: "bash" } },
        { kind: "text", text: "x\n" },
        { kind: "codeEnd" },
      ]);
      assert.deepEqual(doc.sections, [{
        header: "A",
        headerLevel: 3,
        blocks: [{ kind: "code", code: { language: "bash", content: "x", line: 1 } }],
      }]);
    });

    await t.test("a heading that never ends becomes text", () => {
      const doc = compile([
        { kind: "headingStart", level: 2 },
        { kind: "text", text: "Dangling" },
      ]);
      assert.deepEqual(doc.sections, [{
        blocks: [{ kind: "text", text: "Dangling" }],
      }]);
    });

    await t.test("line counter follows hard breaks without positions", () => {
      const doc = compile([
        { kind: "text", text: "a" },
        { kind: "hardBreak" },
        { kind: "text", text: "b" },
        { kind: "codeStart", fence: { kind: "fenced", lang: "sh" } },
        { kind: "text", text: "pwd\n" },
        { kind: "codeEnd" },
      ]);
      assert.equal(steps(doc)[0].line, 2);
    });
  });

  await t.test("compiled documents are frozen", () => {
    const doc = compileMarkdown("# A\n\n```bash\nls\n```\n");
    assert.equal(Object.isFrozen(doc), true);
    assert.equal(Object.isFrozen(doc.sections[0].blocks), true);
    assert.equal(Object.isFrozen(steps(doc)[0]), true);
  });
});
