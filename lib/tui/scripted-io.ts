import type { KeyPress, SessionIO, TerminalSize } from "./terminal.ts";

export function key(name: string, mods?: Partial<KeyPress>): KeyPress {
  return {
    name,
    sequence: name.length === 1 ? name : "",
    ctrl: false,
    meta: false,
    shift: false,
    ...mods,
  };
}

/** In-memory session: replays scripted keys and records everything written. */
export class ScriptedIO implements SessionIO {
  output = "";
  suspensions = 0;

  constructor(
    readonly keys: KeyPress[],
    readonly size: TerminalSize = { columns: 80, rows: 24 },
  ) {}

  write(chunk: string) {
    this.output += chunk;
  }

  nextKey() {
    const next = this.keys.shift();
    return next
      ? Promise.resolve(next)
      : Promise.reject(new Error("key script exhausted"));
  }

  async suspend<T>(fn: () => Promise<T>): Promise<T> {
    this.suspensions++;
    return await fn();
  }
}
