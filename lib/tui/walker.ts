/**
 * Linear walker: prints the runbook top to bottom and stops after every step
 * until the operator confirms it.
 *
 * Keys at the prompt: Enter or Ctrl-D continue, `s` opens a sub-shell (and
 * prompts again afterwards), Ctrl-C ends the session. Step numbering comes
 * from the navigator, which the walker advances as each step is shown.
 */

import { Navigator, type NavigatorOptions } from "../runbook/navigate.ts";
import {
  type CodeBlock,
  contentLines,
  type RunbookDocument,
} from "../runbook/model.ts";
import type { Colors } from "../universal/logger.ts";
import { dropToShell, type ShellLauncher } from "./shell.ts";
import { styleTextLine } from "./style.ts";
import { isCtrl, SessionInterrupted, type SessionIO } from "./terminal.ts";

export interface WalkerOptions {
  readonly io: SessionIO;
  readonly colors: Colors;
  readonly shell: string;
  readonly launchShell?: ShellLauncher;
  readonly navigator?: NavigatorOptions;
}

type PromptAnswer = "continue" | "shell";

export class Walker {
  readonly navigator: Navigator;
  readonly #launchShell: ShellLauncher;

  constructor(readonly document: RunbookDocument, readonly options: WalkerOptions) {
    this.navigator = new Navigator(document, options.navigator);
    this.#launchShell = options.launchShell ?? dropToShell;
  }

  async walk() {
    const { io, colors: c } = this.options;
    const total = this.navigator.stepCount;

    for (const section of this.document.sections) {
      if (section.header !== undefined) {
        io.write(`\n${this.#heading(section.header, section.headerLevel ?? 1)}\n\n`);
      }
      for (const block of section.blocks) {
        if (block.kind === "text") {
          for (const line of contentLines(block.text)) {
            if (line.trim().length) io.write(`${styleTextLine(line, c)}\n`);
          }
          continue;
        }
        const k = this.navigator.advance();
        io.write(this.renderStep(block.code, k, total));
        await this.#confirm(block.code);
      }
    }

    io.write(`\n${c.green("✓ All steps completed!")}\n\n`);
  }

  renderStep(code: CodeBlock, k: number, total: number) {
    const c = this.options.colors;
    let out = `\n${c.yellow(`Step ${k}/${total} [${code.language}]:`)}\n`;
    for (const line of contentLines(code.content)) {
      out += `${c.green(`  ${line}`)}\n`;
    }
    return out + "\n";
  }

  renderPrompt() {
    const c = this.options.colors;
    return c.cyan("→ Press ") + c.yellow("Enter") + c.cyan(" to continue, ") +
      c.yellow("s") + c.cyan(" for a shell, ") + c.yellow("Ctrl-C") +
      c.cyan(" to abort.") + "\n";
  }

  async #confirm(step: CodeBlock) {
    const { io, colors, shell } = this.options;
    for (;;) {
      io.write(this.renderPrompt());
      const answer = await this.#readAnswer();
      if (answer === "continue") return;
      await io.suspend(() =>
        this.#launchShell({ shell, colors, out: io, step })
      );
    }
  }

  async #readAnswer(): Promise<PromptAnswer> {
    for (;;) {
      const key = await this.options.io.nextKey();
      if (isCtrl(key, "c")) throw new SessionInterrupted();
      if (isCtrl(key, "d")) return "continue";
      if (key.name === "return" || key.name === "enter") return "continue";
      if (key.name === "s" && !key.ctrl && !key.meta) return "shell";
    }
  }

  #heading(text: string, level: number) {
    const c = this.options.colors;
    const shown = `${"#".repeat(level)} ${text}`;
    if (level === 1) return c.bold(c.cyan(shown));
    if (level === 2) return c.bold(c.blue(shown));
    return c.bold(c.white(shown));
  }
}
