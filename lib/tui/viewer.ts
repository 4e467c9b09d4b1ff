/**
 * Full-screen runbook viewer.
 *
 * The frame is a pure function of the navigator state and the terminal size:
 * a title row, the layout lines from the scroll offset (truncated to the
 * width, never wrapped), an overlay row for the transient notice and a status
 * bar. `run()` repaints when the navigator reports a step, scroll or notice
 * event, after a shell hand-off and on resize; a timer clears a notice once
 * it expires.
 */

import { type LayoutLine, layoutLines } from "../runbook/layout.ts";
import { isDangerous } from "../runbook/model.ts";
import type { Navigator } from "../runbook/navigate.ts";
import type { Colors } from "../universal/logger.ts";
import { dropToShell, type ShellLauncher } from "./shell.ts";
import {
  clip,
  highlightCodeLine,
  icons,
  stepState,
  styleHeading,
  styleTextLine,
} from "./style.ts";
import {
  isCtrl,
  type KeyPress,
  SessionInterrupted,
  type SessionIO,
  type TerminalSize,
} from "./terminal.ts";

export type ViewerAction = "redraw" | "shell" | "quit";

export interface ViewerOptions {
  readonly colors: Colors;
  readonly shell: string;
  readonly title?: string;
  readonly launchShell?: ShellLauncher;
}

const CLEAR_TO_EOL = "\x1b[K";
const CURSOR_HOME = "\x1b[H";

export class Viewer {
  readonly lines: readonly LayoutLine[];

  constructor(readonly navigator: Navigator, readonly options: ViewerOptions) {
    this.lines = layoutLines(navigator.document);
  }

  /** Rows available for layout lines (title and status bar excluded). */
  contentRows(size: TerminalSize) {
    return Math.max(1, size.rows - 2);
  }

  maxOffset(size: TerminalSize) {
    return Math.max(0, this.lines.length - this.contentRows(size));
  }

  handleKey(key: KeyPress, size: TerminalSize): ViewerAction {
    const nav = this.navigator;
    if (isCtrl(key, "c")) throw new SessionInterrupted();
    if (key.ctrl || key.meta) return "redraw";

    const page = this.contentRows(size);
    switch (key.sequence === "G" ? "G" : key.name) {
      case "q":
        return "quit";
      case "s":
        return "shell";
      case "n":
        nav.advance();
        break;
      case "p":
        nav.retreat();
        break;
      case "up":
        nav.scrollBy(-1);
        break;
      case "down":
        if (nav.scrollOffset < this.maxOffset(size)) nav.scrollBy(1);
        break;
      case "pageup":
        nav.scrollBy(-page);
        break;
      case "pagedown":
        nav.jumpTo(
          Math.max(
            nav.scrollOffset,
            Math.min(this.maxOffset(size), nav.scrollOffset + page),
          ),
        );
        break;
      case "g":
        nav.jumpTo(0);
        break;
      case "G":
        nav.jumpTo(this.maxOffset(size));
        break;
    }
    return "redraw";
  }

  statusText() {
    const total = this.navigator.stepCount;
    const current = this.navigator.current;
    if (total === 0) return " No executable steps | q: Quit ";
    if (current >= total) {
      return " ✅ Final step complete! Press 'q' to quit or 'p' to review. ";
    }
    return ` Step ${current}/${total} | ↑↓: Scroll | n: Next | p: Previous | s: Shell | q: Quit `;
  }

  renderLine(line: LayoutLine, width: number): string {
    const c = this.options.colors;
    switch (line.kind) {
      case "blank":
        return "";
      case "header":
        return styleHeading(clip(line.text, width - line.level - 3), line.level, c);
      case "text":
        return styleTextLine(clip(line.text, width - 3), c);
      case "step-header": {
        const state = stepState(line.step, this.navigator.current);
        const label = `Step ${line.step} [${line.code.language}]`;
        const danger = isDangerous(line.code) ? ` ${icons.danger}` : "";
        const tint = state === "done"
          ? c.green
          : state === "current"
          ? c.yellow
          : c.gray;
        return `${icons[state]} ${c.bold(tint(label))}${danger}`;
      }
      case "code":
        return `    ${
          highlightCodeLine(clip(line.text, width - 4), line.code.language, c)
        }`;
    }
  }

  /** Exactly `size.rows` rows. */
  frame(size: TerminalSize): string[] {
    const c = this.options.colors;
    const width = Math.max(1, size.columns);
    const rows = this.contentRows(size);
    const offset = this.navigator.scrollOffset;

    const out = [
      c.bold(c.cyan(clip(`📘 ${this.options.title ?? "Runbook"}`, width))),
    ];
    for (let i = 0; i < rows; i++) {
      const line = this.lines[offset + i];
      out.push(line ? this.renderLine(line, width) : "");
    }

    const notice = this.navigator.notice();
    if (notice) {
      out[rows] = c.bold(c.black(c.bgYellow(center(notice.message, width))));
    }
    out.push(c.bold(c.white(c.bgBlue(center(this.statusText(), width)))));
    return out.slice(0, size.rows);
  }

  async run(io: SessionIO) {
    const { colors, shell } = this.options;
    const nav = this.navigator;
    const launch = this.options.launchShell ?? dropToShell;
    let painting = true;
    let dirty = false;
    let expiry: NodeJS.Timeout | undefined;

    const paint = () => {
      if (!painting) return;
      dirty = false;
      const rows = this.frame(io.size).map((row) => row + CLEAR_TO_EOL);
      io.write(CURSOR_HOME + rows.join("\n"));
    };
    const scheduleExpiry = () => {
      clearTimeout(expiry);
      const left = nav.noticeExpiresIn();
      expiry = left === undefined ? undefined : setTimeout(() => {
        paint();
        scheduleExpiry();
      }, Math.max(1, left));
    };
    const markDirty = () => {
      dirty = true;
    };
    const unsubscribe = [
      nav.events.on("step", markDirty),
      nav.events.on("scroll", markDirty),
      nav.events.on("notice", () => {
        markDirty();
        scheduleExpiry();
      }),
      io.onResize?.(paint),
    ];

    try {
      paint();
      for (;;) {
        const action = this.handleKey(await io.nextKey(), io.size);
        if (action === "quit") return;
        if (action === "shell") {
          painting = false;
          try {
            await io.suspend(() =>
              launch({ shell, colors, out: io, step: nav.currentStep() })
            );
          } finally {
            painting = true;
          }
          dirty = true;
        }
        if (dirty) paint();
      }
    } finally {
      clearTimeout(expiry);
      for (const off of unsubscribe) off?.();
    }
  }
}

function center(text: string, width: number) {
  const shown = clip(text, width);
  const len = Array.from(shown).length;
  const left = Math.floor((width - len) / 2);
  return " ".repeat(left) + shown + " ".repeat(width - len - left);
}
