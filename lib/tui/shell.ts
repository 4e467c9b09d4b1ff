import type { CodeBlock } from "../runbook/model.ts";
import { contentLines } from "../runbook/model.ts";
import type { Colors } from "../universal/logger.ts";
import { Spawnable } from "../universal/spawnable.ts";
import {
  INTERRUPT_EXIT_CODE,
  SessionInterrupted,
  type TerminalOutput,
} from "./terminal.ts";

export class ShellSpawnError extends Error {
  constructor(readonly shell: string, options?: { cause?: unknown }) {
    super(`Failed to start shell: ${shell}`, options);
    this.name = "ShellSpawnError";
  }
}

export interface ShellHandOff {
  readonly shell: string;
  readonly colors: Colors;
  readonly out: TerminalOutput;
  /** The step the operator is on; printed above the prompt when present. */
  readonly step?: CodeBlock;
}

export type ShellLauncher = (handOff: ShellHandOff) => Promise<void>;

const RULE = "=".repeat(60);

export function shellBanner({ step, colors: c }: Omit<ShellHandOff, "shell" | "out">) {
  const lines: string[] = [];
  if (step) {
    lines.push(c.cyan(RULE));
    lines.push(c.yellow(`Current step [${step.language}]:`));
    for (const line of contentLines(step.content)) {
      lines.push(c.green(`  ${line}`));
    }
    lines.push(c.cyan(RULE));
  }
  lines.push("");
  lines.push(
    c.cyan(
      "→ Dropping into shell. Run the command above, then type exit or press Ctrl-D to continue.",
    ),
  );
  lines.push("");
  return lines.join("\n") + "\n";
}

/**
 * Run an interactive shell on the inherited terminal and wait for it. The
 * caller must have released raw mode first (see `SessionIO.suspend`). SIGINT
 * is ignored here while the child owns the terminal; a shell that exits with
 * status 130 ends the whole session.
 */
export const dropToShell: ShellLauncher = async (handOff) => {
  const { shell, out, colors: c } = handOff;
  out.write(shellBanner(handOff));

  const ignoreInterrupt = () => {};
  process.on("SIGINT", ignoreInterrupt);
  let code: number | null;
  try {
    const result = await Spawnable.from(shell).run();
    code = result.code;
  } catch (cause) {
    throw new ShellSpawnError(shell, { cause });
  } finally {
    process.off("SIGINT", ignoreInterrupt);
  }

  if (code === INTERRUPT_EXIT_CODE) throw new SessionInterrupted();
  out.write(c.gray("\nReturning to runbook...\n"));
};
