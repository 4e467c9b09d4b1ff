import assert from "node:assert/strict";
import { test } from "node:test";
import pc from "picocolors";
import { consoleLogger } from "./logger.ts";

const plain = pc.createColors(false);

test("consoleLogger", async (t) => {
  await t.test("formats level, message and meta", () => {
    const lines: string[] = [];
    const log = consoleLogger({ colors: plain, sink: (l) => lines.push(l) });
    log({ level: "info", msg: "loaded", meta: { steps: 3 } });
    log({ level: "error", msg: "failed" });
    assert.deepEqual(lines, ['[INFO ] loaded {"steps":3}', "[ERROR] failed"]);
  });

  await t.test("debug lines need verbose", () => {
    const quiet: string[] = [];
    const loud: string[] = [];
    consoleLogger({ colors: plain, sink: (l) => quiet.push(l) })({
      level: "debug",
      msg: "lint",
    });
    consoleLogger({ colors: plain, verbose: true, sink: (l) => loud.push(l) })(
      { level: "debug", msg: "lint" },
    );
    assert.deepEqual(quiet, []);
    assert.deepEqual(loud, ["[DEBUG] lint"]);
  });
});
