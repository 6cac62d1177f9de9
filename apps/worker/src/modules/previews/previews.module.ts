import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import pLimit from "p-limit";

import { AppError, componentLogger, errorMessage, type Logger, type TrackDescriptor } from "@trackprint/shared";

import { timeoutSignal } from "../../lib/abort";
import { previewKey, sanitizeFilename } from "../../pipeline/tracks";
import type { Downloader, PreviewResolver, PreviewUrlMap } from "../../types/processing";

export const DOWNLOAD_TIMEOUT_MS = 10_000;

export type FetchPreviewsOptions = {
  previewsDir: string;
  resolver: PreviewResolver;
  download?: Downloader;
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  log?: Logger;
};

export type FetchSummary = {
  status: "success" | "error";
  message: string;
  tracks_total: number;
  tracks_downloaded: number;
  /** target file already present from an earlier run */
  tracks_skipped: number;
  /** neither the track nor the resolver had a preview url */
  tracks_unavailable: number;
  tracks_failed: number;
  /** track id → local clip path, for every track that has a clip on disk */
  files: Record<string, string>;
};

function isRetryableHttp(status: number) {
  return status === 429 || (status >= 500 && status <= 599);
}

export const httpDownload: Downloader = async (url, destPath, opts) => {
  const { signal, dispose } = timeoutSignal(opts.timeoutMs, opts.signal);
  try {
    const resp = await fetch(url, { method: "GET", signal, redirect: "follow" });
    if (!resp.ok || !resp.body) {
      throw new AppError({
        code: "FETCH_FAILED",
        message: `Preview download failed: HTTP ${resp.status}`,
        retryable: isRetryableHttp(resp.status),
        details: { url, status: resp.status },
      });
    }
    await pipeline(Readable.fromWeb(resp.body), fs.createWriteStream(destPath), { signal });
  } finally {
    dispose();
  }
};

async function fileExists(p: string) {
  try {
    const st = await fsp.stat(p);
    return st.isFile() && st.size > 0;
  } catch {
    return false;
  }
}

function emptySummary(tracks: TrackDescriptor[]): FetchSummary {
  return {
    status: "success",
    message: "",
    tracks_total: tracks.length,
    tracks_downloaded: 0,
    tracks_skipped: 0,
    tracks_unavailable: 0,
    tracks_failed: 0,
    files: {},
  };
}

export function previewPath(previewsDir: string, t: Pick<TrackDescriptor, "name" | "artist">) {
  return path.join(previewsDir, `${sanitizeFilename(previewKey(t))}.mp3`);
}

/**
 * Resolves missing preview urls in one batch, then downloads every clip that is not
 * on disk yet. Per-track problems are counted and logged, never thrown; only an
 * unreachable resolver turns the whole batch into an error summary.
 */
export async function fetchPreviews(tracks: TrackDescriptor[], opts: FetchPreviewsOptions): Promise<FetchSummary> {
  const log = opts.log ?? componentLogger("previews");
  const download = opts.download ?? httpDownload;
  const timeoutMs = opts.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
  const summary = emptySummary(tracks);

  await fsp.mkdir(opts.previewsDir, { recursive: true });

  const unresolved = tracks.filter((t) => !t.preview_url);
  let resolved: PreviewUrlMap = {};

  if (unresolved.length > 0) {
    const seen = new Set<string>();
    const queries = unresolved
      .filter((t) => {
        const key = previewKey(t);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      })
      .map((t) => ({ name: t.name, artist: t.artist }));

    try {
      resolved = await opts.resolver.resolve(queries, opts.signal);
    } catch (err) {
      log.error({ err: errorMessage(err), queries: queries.length }, "preview resolver unavailable");
      return { ...summary, status: "error", message: `Preview resolver unavailable: ${errorMessage(err)}` };
    }
  }

  // tracks whose keys sanitize to the same name share one file
  const groups = new Map<string, { key: string; url: string | null; file: string; tracks: TrackDescriptor[] }>();
  for (const t of tracks) {
    const key = previewKey(t);
    const file = previewPath(opts.previewsDir, t);
    const url = t.preview_url || resolved[key] || null;
    const group = groups.get(file);
    if (group) {
      group.tracks.push(t);
      group.url = group.url ?? url;
    } else {
      groups.set(file, { key, url, file, tracks: [t] });
    }
  }

  const limit = pLimit(Math.max(1, opts.concurrency ?? 4));

  await Promise.all(
    [...groups.values()].map((group) =>
      limit(async () => {
        const n = group.tracks.length;
        const mark = () => {
          for (const t of group.tracks) summary.files[t.id] = group.file;
        };

        if (await fileExists(group.file)) {
          summary.tracks_skipped += n;
          mark();
          return;
        }

        if (!group.url) {
          log.warn({ key: group.key }, "no preview available");
          summary.tracks_unavailable += n;
          return;
        }

        const partPath = `${group.file}.part`;
        try {
          await download(group.url, partPath, { timeoutMs, signal: opts.signal });
          await fsp.rename(partPath, group.file);
          summary.tracks_downloaded += n;
          mark();
        } catch (err) {
          await fsp.rm(partPath, { force: true });
          summary.tracks_failed += n;
          log.warn({ key: group.key, url: group.url, err: errorMessage(err) }, "preview download failed");
        }
      })
    )
  );

  summary.message = `Downloaded ${summary.tracks_downloaded} previews out of ${summary.tracks_total} tracks`;
  log.info(
    {
      total: summary.tracks_total,
      downloaded: summary.tracks_downloaded,
      skipped: summary.tracks_skipped,
      unavailable: summary.tracks_unavailable,
      failed: summary.tracks_failed,
    },
    summary.message
  );
  return summary;
}
