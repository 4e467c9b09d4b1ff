// Thin wrapper around node:child_process spawn. The child gets the
// terminal: stdio is inherited, nothing is captured.

import { spawn } from "node:child_process";

export interface SpawnResult {
  readonly command: readonly string[];
  /** Exit status, or null when the child was ended by a signal. */
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly success: boolean;
}

export class Spawnable {
  private constructor(private readonly cmd: string) {}

  static from(cmd: string) {
    return new Spawnable(cmd);
  }

  run(): Promise<SpawnResult> {
    const command = [this.cmd];
    return new Promise<SpawnResult>((resolve, reject) => {
      const child = spawn(this.cmd, [], { stdio: "inherit" });
      child.once("error", reject);
      child.once("close", (code, signal) =>
        resolve({ command, code, signal, success: code === 0 }));
    });
  }
}
