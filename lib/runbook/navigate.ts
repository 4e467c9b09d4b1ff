/**
 * Step navigation over a compiled runbook.
 *
 * State is the current step (0 = nothing run yet, N = every step consumed)
 * and a scroll offset into the rendered layout. Every step change replays the
 * layout from the top to find the step's header line and scrolls so the step
 * sits near the top with `lookback` lines of context above it. Navigation
 * never throws; out-of-range requests clamp or become no-ops.
 */

import { type EventBus, eventBus } from "../universal/event-bus.ts";
import { layout } from "./layout.ts";
import { type CodeBlock, type RunbookDocument, steps } from "./model.ts";

export const DEFAULT_LOOKBACK = 5;
export const DEFAULT_NOTICE_TTL_MS = 4000;
export const FINAL_STEP_NOTICE =
  "🎉 You've reached the final step! Press 'q' to quit or 'p' to go back.";

export interface Notice {
  readonly message: string;
  readonly createdAt: number;
}

export type NavigationEvents = {
  step: { current: number; previous: number; total: number };
  scroll: { offset: number; previous: number };
  notice: Notice;
};

export interface NavigatorOptions {
  readonly lookback?: number;
  readonly noticeTtlMs?: number;
  readonly clock?: () => number;
}

/** Replay the layout and return the scroll offset that brings `step` into view. */
export function scrollOffsetFor(
  doc: RunbookDocument,
  step: number,
  lookback = DEFAULT_LOOKBACK,
): number {
  if (step <= 0) return 0;
  let lineNo = 0;
  for (const line of layout(doc)) {
    if (line.kind === "step-header" && line.step === step) {
      return Math.max(0, lineNo - lookback);
    }
    lineNo++;
  }
  return 0;
}

export class Navigator {
  readonly events: EventBus<NavigationEvents> = eventBus<NavigationEvents>();
  readonly #lookback: number;
  readonly #noticeTtlMs: number;
  readonly #clock: () => number;

  #current = 0;
  #scrollOffset = 0;
  #notice: Notice | undefined;
  #noticedAtTerminal = false;

  constructor(readonly document: RunbookDocument, opts?: NavigatorOptions) {
    this.#lookback = opts?.lookback ?? DEFAULT_LOOKBACK;
    this.#noticeTtlMs = opts?.noticeTtlMs ?? DEFAULT_NOTICE_TTL_MS;
    this.#clock = opts?.clock ?? Date.now;
  }

  get current() {
    return this.#current;
  }

  get scrollOffset() {
    return this.#scrollOffset;
  }

  get steps(): readonly CodeBlock[] {
    return steps(this.document);
  }

  get stepCount() {
    return this.steps.length;
  }

  isTerminal() {
    const total = this.stepCount;
    return total > 0 && this.#current >= total;
  }

  /** The step the operator is on, if any (undefined at step 0). */
  currentStep(): CodeBlock | undefined {
    return this.#current > 0 ? this.steps[this.#current - 1] : undefined;
  }

  advance() {
    const total = this.stepCount;
    if (this.#current < total) {
      this.#moveTo(this.#current + 1, total);
    } else if (total > 0 && !this.#noticedAtTerminal) {
      this.#noticedAtTerminal = true;
      this.#notice = { message: FINAL_STEP_NOTICE, createdAt: this.#clock() };
      this.events.emit("notice", this.#notice);
    }
    return this.#current;
  }

  retreat() {
    if (this.#current > 0) this.#moveTo(this.#current - 1, this.stepCount);
    return this.#current;
  }

  /** Manual scroll; leaves the current step alone. */
  jumpTo(offset: number) {
    const next = Number.isFinite(offset) ? Math.max(0, Math.trunc(offset)) : 0;
    const previous = this.#scrollOffset;
    if (next !== previous) {
      this.#scrollOffset = next;
      this.events.emit("scroll", { offset: next, previous });
    }
    return this.#scrollOffset;
  }

  scrollBy(delta: number) {
    return this.jumpTo(this.#scrollOffset + delta);
  }

  /** The transient notice while it is younger than the TTL; expired ones are cleared. */
  notice(): Notice | undefined {
    if (
      this.#notice && this.#clock() - this.#notice.createdAt >= this.#noticeTtlMs
    ) {
      this.#notice = undefined;
    }
    return this.#notice;
  }

  /** Milliseconds until the current notice expires, if one is showing. */
  noticeExpiresIn(): number | undefined {
    const notice = this.notice();
    return notice
      ? notice.createdAt + this.#noticeTtlMs - this.#clock()
      : undefined;
  }

  #moveTo(step: number, total: number) {
    const previous = this.#current;
    this.#current = step;
    this.#noticedAtTerminal = false;
    this.events.emit("step", { current: step, previous, total });
    this.jumpTo(scrollOffsetFor(this.document, step, this.#lookback));
  }
}
