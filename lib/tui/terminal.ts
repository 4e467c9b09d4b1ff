/**
 * Terminal session guard and key input.
 *
 * `TerminalSession.run()` puts the input into raw mode (and, for the viewer,
 * the alternate screen with a hidden cursor) and restores everything in
 * `finally`, whether the body returns, throws, or is interrupted. While raw,
 * Ctrl-C arrives as an ordinary key; adapters turn it into
 * `SessionInterrupted`, which the CLI maps to exit status 130.
 */

import { emitKeypressEvents } from "node:readline";

export const INTERRUPT_EXIT_CODE = 130;

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const CURSOR_HIDE = "\x1b[?25l";
const CURSOR_SHOW = "\x1b[?25h";

export class SessionInterrupted extends Error {
  readonly exitCode = INTERRUPT_EXIT_CODE;

  constructor(message = "Interrupted.") {
    super(message);
    this.name = "SessionInterrupted";
  }
}

export interface KeyPress {
  readonly name?: string;
  readonly sequence: string;
  readonly ctrl: boolean;
  readonly meta: boolean;
  readonly shift: boolean;
}

export interface KeySource {
  nextKey(): Promise<KeyPress>;
}

export function isCtrl(key: KeyPress, name: string) {
  return key.ctrl && key.name === name;
}

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface TerminalOutput {
  write(chunk: string): unknown;
  readonly columns?: number;
  readonly rows?: number;
  on?(event: "resize", listener: () => void): unknown;
  off?(event: "resize", listener: () => void): unknown;
}

export interface TerminalSize {
  readonly columns: number;
  readonly rows: number;
}

/** What the walker and the viewer need from a session. */
export interface SessionIO extends KeySource {
  readonly size: TerminalSize;
  write(chunk: string): void;
  /** Hand the terminal to `fn` (e.g. a sub-shell), then take it back. */
  suspend<T>(fn: () => Promise<T>): Promise<T>;
  /** Subscribe to terminal size changes; returns the unsubscribe. */
  onResize?(listener: () => void): () => void;
}

/* ============================== Key reader ============================== */

interface KeyWaiter {
  resolve(key: KeyPress): void;
  reject(error: Error): void;
}

/**
 * Queue of keypresses decoded by node:readline from a readable stream. Keys
 * already decoded are still delivered once the stream ends; after that every
 * `nextKey()` rejects with `SessionInterrupted`.
 */
export class KeyReader implements KeySource {
  readonly #pending: KeyPress[] = [];
  readonly #waiters: KeyWaiter[] = [];
  #ended = false;

  readonly #onKeypress = (
    str: string | undefined,
    key: Partial<KeyPress> | undefined,
  ) => {
    const press: KeyPress = {
      name: key?.name,
      sequence: key?.sequence ?? str ?? "",
      ctrl: key?.ctrl ?? false,
      meta: key?.meta ?? false,
      shift: key?.shift ?? false,
    };
    const waiter = this.#waiters.shift();
    if (waiter) waiter.resolve(press);
    else this.#pending.push(press);
  };

  readonly #onEnd = () => {
    this.#ended = true;
    for (const waiter of this.#waiters.splice(0)) {
      waiter.reject(new SessionInterrupted("Input closed."));
    }
  };

  constructor(readonly input: NodeJS.ReadableStream) {
    emitKeypressEvents(input);
    input.on("keypress", this.#onKeypress);
    input.on("end", this.#onEnd);
    input.on("close", this.#onEnd);
  }

  nextKey(): Promise<KeyPress> {
    const ready = this.#pending.shift();
    if (ready) return Promise.resolve(ready);
    if (this.#ended) {
      return Promise.reject(new SessionInterrupted("Input closed."));
    }
    this.input.resume();
    return new Promise((resolve, reject) =>
      this.#waiters.push({ resolve, reject })
    );
  }

  close() {
    this.input.off("keypress", this.#onKeypress);
    this.input.off("end", this.#onEnd);
    this.input.off("close", this.#onEnd);
    this.input.pause();
  }
}

/* =========================== Terminal session =========================== */

export interface TerminalSessionOptions {
  readonly input: TerminalInput;
  readonly output: TerminalOutput;
  /** Alternate screen + hidden cursor (viewer); the walker stays inline. */
  readonly fullScreen?: boolean;
}

export class TerminalSession implements SessionIO {
  readonly keys: KeyReader;
  #active = false;

  constructor(readonly options: TerminalSessionOptions) {
    this.keys = new KeyReader(options.input);
  }

  static async run<T>(
    options: TerminalSessionOptions,
    fn: (session: TerminalSession) => Promise<T>,
  ): Promise<T> {
    const session = new TerminalSession(options);
    session.enter();
    try {
      return await fn(session);
    } finally {
      session.leave();
      session.keys.close();
    }
  }

  get active() {
    return this.#active;
  }

  get size(): TerminalSize {
    return {
      columns: this.options.output.columns ?? 80,
      rows: this.options.output.rows ?? 24,
    };
  }

  enter() {
    if (this.#active) return;
    const { input, output, fullScreen } = this.options;
    if (input.isTTY) input.setRawMode?.(true);
    input.resume();
    if (fullScreen) output.write(ALT_SCREEN_ON + CURSOR_HIDE);
    this.#active = true;
  }

  leave() {
    if (!this.#active) return;
    const { input, output, fullScreen } = this.options;
    if (fullScreen) output.write(CURSOR_SHOW + ALT_SCREEN_OFF);
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
    this.#active = false;
  }

  async suspend<T>(fn: () => Promise<T>): Promise<T> {
    this.leave();
    try {
      return await fn();
    } finally {
      this.enter();
    }
  }

  write(chunk: string) {
    this.options.output.write(chunk);
  }

  onResize(listener: () => void) {
    const { output } = this.options;
    output.on?.("resize", listener);
    return () => {
      output.off?.("resize", listener);
    };
  }

  nextKey() {
    return this.keys.nextKey();
  }
}
