/**
 * Runbook loader: Markdown file or string → compiled document + frontmatter.
 *
 * - YAML frontmatter (the leading `---` block only) is parsed with `yaml` and
 *   validated with a caller-supplied zod schema; `runbookFmSchema` is the
 *   default and knows `title`, `description` and `shell`.
 * - The body is parsed once; the mdast tree feeds both the compiler's event
 *   stream and a lint pass that records untagged and unterminated fences.
 * - Every issue carries a disposition. Frontmatter problems default to
 *   "warning" (fm is then undefined), fence findings to "lint". An issue
 *   handler may override a disposition; any final "error" makes `build()`
 *   throw a RunbookLoadError that carries the issues.
 *
 * @example
 * const rb = (await RunbookBuilder.typical().fromFile("restore-db.md")).build();
 * console.log(rb.fm?.title, stepCount(rb.document));
 */

import { readFile } from "node:fs/promises";
import type { Root, RootContent } from "mdast";
import { parse as YAMLparse } from "yaml";
import { z } from "zod";
import { compile } from "./compile.ts";
import type { RunbookDocument } from "./model.ts";
import {
  fenceOf,
  isUnterminatedFence,
  parseMarkdown,
  treeEvents,
} from "./tokenize.ts";

/* =============================== Issues ================================== */

export type IssueDisposition = "error" | "warning" | "lint";

export interface IssueLocation {
  readonly filename: string;
  readonly line?: number;
}

export type Issue =
  | ({
    kind: "frontmatter-parse";
    message: string;
    raw: string;
    error: unknown;
  } & IssueLocation)
  | ({
    kind: "frontmatter-validate";
    message: string;
    candidate: unknown;
    zodError: z.ZodError;
  } & IssueLocation)
  | ({
    kind: "unterminated-fence";
    message: string;
    lang: string;
  } & IssueLocation)
  | ({
    kind: "untagged-fence";
    message: string;
  } & IssueLocation);

export type IssueHandler = (issue: Issue) => IssueDisposition | void;

export type EmittedIssue = Issue & { readonly disposition: IssueDisposition };

function defaultDispositionFor(issue: Issue): IssueDisposition {
  switch (issue.kind) {
    case "frontmatter-parse":
    case "frontmatter-validate":
      return "warning";
    case "unterminated-fence":
    case "untagged-fence":
      return "lint";
  }
}

function finalizeIssue(issue: Issue, handler?: IssueHandler): EmittedIssue {
  const override = handler?.(issue);
  return Object.freeze({
    ...issue,
    disposition: override ?? defaultDispositionFor(issue),
  });
}

export class RunbookLoadError extends Error {
  constructor(
    message: string,
    readonly filename: string,
    readonly issues: readonly EmittedIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RunbookLoadError";
  }
}

/* ============================ Frontmatter ================================ */

export const runbookFmSchema = z.looseObject({
  title: z.string().optional(),
  description: z.string().optional(),
  shell: z.string().min(1).optional(),
});

export type RunbookFrontmatter = z.infer<typeof runbookFmSchema>;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function frontmatterNode(tree: Root) {
  const first: RootContent | undefined = tree.children[0];
  return first?.type === "yaml" ? first : undefined;
}

/* =============================== Runbook ================================= */

export interface Runbook<FM = RunbookFrontmatter> {
  readonly filename: string;
  readonly source: string;
  /** Undefined when the frontmatter failed to parse or validate (see issues). */
  readonly fm: FM | undefined;
  readonly document: RunbookDocument;
  readonly issues: readonly EmittedIssue[];
}

/** Report fences that will not become steps. */
function lintFences(
  tree: Root,
  source: string,
  filename: string,
  report: (issue: Issue) => void,
) {
  const visit = (nodes: readonly RootContent[]) => {
    for (const n of nodes) {
      if (n.type === "code") {
        const fence = fenceOf(n, source);
        const line = n.position?.start.line;
        if (fence.kind === "fenced" && isUnterminatedFence(n, source)) {
          report({
            kind: "unterminated-fence",
            message: "Code fence is never closed; it will not become a step.",
            lang: fence.lang,
            filename,
            line,
          });
        } else if (fence.kind === "indented" || fence.lang.length === 0) {
          report({
            kind: "untagged-fence",
            message:
              "Code block has no language tag; it is shown as documentation, not as a step.",
            filename,
            line,
          });
        }
      } else if ("children" in n) {
        visit(n.children);
      }
    }
  };
  visit(tree.children);
}

/* ============================== Builder ================================== */

export class RunbookBuilder<FM = RunbookFrontmatter> {
  #source?: string;
  #filename?: string;
  #issueHandler?: IssueHandler;

  constructor(readonly fmSchema: z.ZodType<FM>) {}

  /** Builder using `runbookFmSchema` for frontmatter. */
  static typical() {
    return new RunbookBuilder(runbookFmSchema);
  }

  withIssueHandler(handler: IssueHandler) {
    this.#issueHandler = handler;
    return this;
  }

  async fromFile(path: string) {
    try {
      this.#source = await readFile(path, "utf8");
    } catch (cause) {
      throw new RunbookLoadError(`Failed to read file: ${path}`, path, [], {
        cause,
      });
    }
    this.#filename = path;
    return this;
  }

  fromString(source: string, filename = "runbook.md") {
    this.#source = source;
    this.#filename = filename;
    return this;
  }

  build(): Runbook<FM> {
    if (this.#source === undefined || this.#filename === undefined) {
      throw new Error("Call fromFile()/fromString() first.");
    }
    const source = this.#source;
    const filename = this.#filename;
    const issues: EmittedIssue[] = [];
    const report = (issue: Issue) => {
      issues.push(finalizeIssue(issue, this.#issueHandler));
    };

    const tree = parseMarkdown(source);
    const fm = this.#frontmatter(tree, filename, report);
    lintFences(tree, source, filename, report);
    const document = compile(treeEvents(tree, source));

    const errors = issues.filter((i) => i.disposition === "error");
    if (errors.length > 0) {
      throw new RunbookLoadError(
        `Runbook ${filename} has ${errors.length} error(s): ${
          errors.map((e) => e.message).join("; ")
        }`,
        filename,
        issues,
      );
    }

    return Object.freeze({ filename, source, fm, document, issues });
  }

  #frontmatter(
    tree: Root,
    filename: string,
    report: (issue: Issue) => void,
  ): FM | undefined {
    const node = frontmatterNode(tree);
    let raw: unknown = {};
    if (node) {
      try {
        raw = YAMLparse(node.value) ?? {};
      } catch (error) {
        report({
          kind: "frontmatter-parse",
          message: "Frontmatter is not valid YAML.",
          raw: node.value,
          error,
          filename,
          line: node.position?.start.line,
        });
        return undefined;
      }
    }

    const res = this.fmSchema.safeParse(isRecord(raw) ? raw : {});
    if (res.success) return res.data;
    report({
      kind: "frontmatter-validate",
      message: "Frontmatter failed schema validation.",
      candidate: raw,
      zodError: res.error,
      filename,
      line: node?.position?.start.line,
    });
    return undefined;
  }
}
