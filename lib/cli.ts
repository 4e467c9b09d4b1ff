import Table from "cli-table3";
import { Command } from "commander";
import pc from "picocolors";
import { z } from "zod";
import {
  type EmittedIssue,
  type Runbook,
  RunbookBuilder,
} from "./runbook/load.ts";
import { contentLines, isDangerous, steps } from "./runbook/model.ts";
import { Navigator } from "./runbook/navigate.ts";
import {
  type CliOptions,
  cliOptionsSchema,
  resolveSessionConfig,
  type SessionConfig,
} from "./tui/config.ts";
import type { ShellLauncher } from "./tui/shell.ts";
import {
  SessionInterrupted,
  type TerminalInput,
  type TerminalOutput,
  TerminalSession,
} from "./tui/terminal.ts";
import { Viewer } from "./tui/viewer.ts";
import { Walker } from "./tui/walker.ts";
import { type Colors, consoleLogger, type Logger } from "./universal/logger.ts";

export const VERSION = "0.1.0";

/** Exit status and message for an error that escaped a command. */
export function failureOf(error: unknown): { code: number; message: string } {
  if (error instanceof SessionInterrupted) {
    return { code: error.exitCode, message: "\n\nInterrupted." };
  }
  if (error instanceof z.ZodError) {
    return { code: 1, message: `✖ Invalid options\n${z.prettifyError(error)}` };
  }
  return {
    code: 1,
    message: `✖ ${error instanceof Error ? error.message : String(error)}`,
  };
}

export interface CliStreams {
  readonly stdin: TerminalInput;
  readonly stdout: TerminalOutput & { readonly isTTY?: boolean };
  readonly env: Record<string, string | undefined>;
}

export class CLI {
  constructor(
    readonly streams: CliStreams = {
      stdin: process.stdin,
      stdout: process.stdout,
      env: process.env,
    },
    readonly launchShell?: ShellLauncher,
  ) {}

  #print(text = "") {
    this.streams.stdout.write(`${text}\n`);
  }

  #colors(cfg: SessionConfig): Colors {
    return pc.createColors(cfg.color);
  }

  logger(cfg: SessionConfig): Logger {
    return consoleLogger({ verbose: cfg.verbose, colors: this.#colors(cfg) });
  }

  async load(file: string, cli: CliOptions) {
    const runbook = (await RunbookBuilder.typical().fromFile(file)).build();
    const cfg = resolveSessionConfig({
      cli,
      fm: runbook.fm,
      env: this.streams.env,
      isTTY: this.streams.stdout.isTTY,
    });
    this.reportIssues(runbook.issues, this.logger(cfg));
    return { runbook, cfg };
  }

  reportIssues(issues: readonly EmittedIssue[], log: Logger) {
    for (const issue of issues) {
      const where = issue.line ? `${issue.filename}:${issue.line}` : issue.filename;
      log({
        level: issue.disposition === "lint" ? "debug" : "warn",
        msg: `${where} ${issue.message}`,
        meta: { kind: issue.kind },
      });
    }
  }

  async run(file: string, cli: CliOptions) {
    const { runbook, cfg } = await this.load(file, cli);
    await TerminalSession.run(
      { input: this.streams.stdin, output: this.streams.stdout },
      (session) =>
        new Walker(runbook.document, {
          io: session,
          colors: this.#colors(cfg),
          shell: cfg.shell,
          launchShell: this.launchShell,
          navigator: { lookback: cfg.lookback, noticeTtlMs: cfg.noticeTtlMs },
        }).walk(),
    );
  }

  async tui(file: string, cli: CliOptions) {
    const { runbook, cfg } = await this.load(file, cli);
    const navigator = new Navigator(runbook.document, {
      lookback: cfg.lookback,
      noticeTtlMs: cfg.noticeTtlMs,
    });
    const viewer = new Viewer(navigator, {
      colors: this.#colors(cfg),
      shell: cfg.shell,
      title: runbook.fm?.title ?? file,
      launchShell: this.launchShell,
    });
    await TerminalSession.run(
      {
        input: this.streams.stdin,
        output: this.streams.stdout,
        fullScreen: true,
      },
      (session) => viewer.run(session),
    );
  }

  dryRunText(runbook: Runbook) {
    const all = steps(runbook.document);
    const lines = [`Dry run - ${all.length} steps found:`, ""];
    all.forEach((step, i) => {
      lines.push(`Step ${i + 1} [${step.language}]:`);
      for (const line of contentLines(step.content)) lines.push(`  ${line}`);
      lines.push("");
    });
    return lines.join("\n");
  }

  async dryRun(file: string, cli: CliOptions) {
    const { runbook } = await this.load(file, cli);
    this.streams.stdout.write(this.dryRunText(runbook));
  }

  async view(file: string, cli: CliOptions) {
    const { runbook } = await this.load(file, cli);
    this.streams.stdout.write(runbook.source);
  }

  lsRows(runbook: Runbook) {
    return steps(runbook.document).map((step, i) => ({
      step: i + 1,
      language: step.language,
      line: step.line,
      command: contentLines(step.content)[0] ?? "",
      dangerous: isDangerous(step),
    }));
  }

  async ls(file: string, cli: CliOptions & { json?: boolean }) {
    const { runbook, cfg } = await this.load(file, cli);
    const rows = this.lsRows(runbook);
    if (cli.json) {
      this.#print(JSON.stringify(rows, null, 2));
      return;
    }
    const c = this.#colors(cfg);
    const table = new Table({ head: ["#", "Lang", "Line", "Command", ""] });
    for (const r of rows) {
      table.push([
        String(r.step),
        c.yellow(r.language),
        c.gray(String(r.line)),
        r.command,
        r.dangerous ? "🔥" : "",
      ]);
    }
    this.#print(table.toString());
  }

  cli(name = "stepdown") {
    const options = (cmd: Command) => cliOptionsSchema.parse(cmd.optsWithGlobals());

    const program = new Command()
      .name(name)
      .version(VERSION)
      .description("Walk through a Markdown runbook one code step at a time.")
      .option("--shell <path>", "shell for the sub-shell hand-off")
      .option("--lookback <lines>", "lines of context kept above the current step")
      .option("--notice-ttl <ms>", "how long the viewer shows a notice")
      .option("--no-color", "disable colored output")
      .option("--verbose", "log loader diagnostics")
      .argument("[file]", "runbook to walk (same as `run <file>`)")
      .action(async (file: string | undefined, _opts: unknown, cmd: Command) => {
        if (!file) {
          console.error("Error: No file specified\n");
          return cmd.help({ error: true });
        }
        await this.run(file, options(cmd));
      });

    program.command("run")
      .description("walk the runbook step by step (default)")
      .argument("<file>")
      .action((file: string, _opts: unknown, cmd: Command) => this.run(file, options(cmd)));

    program.command("tui")
      .description("browse the runbook in a full-screen viewer")
      .argument("<file>")
      .action((file: string, _opts: unknown, cmd: Command) => this.tui(file, options(cmd)));

    program.command("dry-run")
      .description("list every step without running anything")
      .argument("<file>")
      .action((file: string, _opts: unknown, cmd: Command) =>
        this.dryRun(file, options(cmd))
      );

    program.command("view")
      .description("print the raw runbook source")
      .argument("<file>")
      .action((file: string, _opts: unknown, cmd: Command) => this.view(file, options(cmd)));

    program.command("ls")
      .description("tabulate the steps of a runbook")
      .argument("<file>")
      .option("--json", "emit JSON instead of a table")
      .action((file: string, opts: { json?: boolean }, cmd: Command) =>
        this.ls(file, { ...options(cmd), json: opts.json === true })
      );

    return program;
  }
}
