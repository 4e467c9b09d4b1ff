import { z } from "zod";
import {
  DEFAULT_LOOKBACK,
  DEFAULT_NOTICE_TTL_MS,
} from "../runbook/navigate.ts";

export const DEFAULT_SHELL = "/bin/bash";

export const sessionConfigSchema = z.object({
  shell: z.string().min(1),
  lookback: z.number().int().min(0).default(DEFAULT_LOOKBACK),
  noticeTtlMs: z.number().int().positive().default(DEFAULT_NOTICE_TTL_MS),
  color: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

/** Options as they arrive from the command line (all optional). */
export const cliOptionsSchema = z.object({
  shell: z.string().min(1).optional(),
  lookback: z.coerce.number().int().min(0).optional(),
  noticeTtl: z.coerce.number().int().positive().optional(),
  color: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Shell precedence: `--shell`, then the runbook's frontmatter `shell`, then
 * `$SHELL`, then `/bin/bash`. Color is off with `--no-color`, `NO_COLOR` or a
 * non-TTY output. `--lookback` and `--notice-ttl` tune the navigator and fall
 * back to its defaults.
 */
export function resolveSessionConfig(init: {
  cli?: CliOptions;
  fm?: { shell?: string };
  env?: Record<string, string | undefined>;
  isTTY?: boolean;
}): SessionConfig {
  const env = init.env ?? {};
  const envShell = env.SHELL?.trim() ? env.SHELL : undefined;
  return sessionConfigSchema.parse({
    shell: init.cli?.shell ?? init.fm?.shell ?? envShell ?? DEFAULT_SHELL,
    lookback: init.cli?.lookback,
    noticeTtlMs: init.cli?.noticeTtl,
    color: (init.cli?.color ?? true) && (init.isTTY ?? false) &&
      env.NO_COLOR === undefined,
    verbose: init.cli?.verbose ?? false,
  });
}
