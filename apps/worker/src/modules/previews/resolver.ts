import { z } from "zod";

import { AppError, errorMessage, type Logger } from "@trackprint/shared";

import { previewKey } from "../../pipeline/tracks";
import { runCmd, splitCommand, type CommandRunner } from "../../lib/runCmd";
import type { PreviewQuery, PreviewResolver, PreviewUrlMap } from "../../types/processing";

const ResolverOutput = z.record(z.string(), z.string().url().nullable());

/**
 * Delegates lookup to an external program: the query list goes to its stdin as
 * JSON, and it must print a `{"name - artist": url | null}` object on stdout.
 */
export class CommandPreviewResolver implements PreviewResolver {
  private readonly cmd: string;
  private readonly args: string[];

  constructor(
    commandLine: string,
    private readonly run: CommandRunner = runCmd,
    private readonly log?: Logger
  ) {
    const { cmd, args } = splitCommand(commandLine);
    if (!cmd) {
      throw new AppError({ code: "BAD_INPUT", message: "Preview resolver command is empty", retryable: false });
    }
    this.cmd = cmd;
    this.args = args;
  }

  async resolve(queries: PreviewQuery[], signal?: AbortSignal): Promise<PreviewUrlMap> {
    if (queries.length === 0) return {};

    this.log?.info({ cmd: this.cmd, queries: queries.length }, "resolving preview urls");
    const { stdout, stderr } = await this.run(this.cmd, this.args, { input: JSON.stringify(queries), signal });
    if (stderr.trim()) this.log?.debug({ stderr: stderr.trim() }, "preview resolver stderr");

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new AppError({
        code: "FETCH_FAILED",
        message: `Preview resolver printed invalid JSON: ${errorMessage(err)}`,
        retryable: false,
        cause: err,
      });
    }

    const parsed = ResolverOutput.safeParse(json);
    if (!parsed.success) {
      throw new AppError({
        code: "FETCH_FAILED",
        message: `Preview resolver output has the wrong shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        retryable: false,
      });
    }

    const found = Object.values(parsed.data).filter(Boolean).length;
    this.log?.info({ found, total: queries.length }, "preview urls resolved");
    return parsed.data;
  }
}

/** canned mappings: local runs without a resolver, and tests */
export class StaticPreviewResolver implements PreviewResolver {
  constructor(private readonly urls: PreviewUrlMap = {}) {}

  async resolve(queries: PreviewQuery[]): Promise<PreviewUrlMap> {
    const out: PreviewUrlMap = {};
    for (const q of queries) {
      const key = previewKey(q);
      out[key] = this.urls[key] ?? null;
    }
    return out;
  }
}
