import fsp from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";

import { AppError, componentLogger, errorMessage, type Logger } from "@trackprint/shared";

import { runCmd, type CommandRunner } from "../../lib/runCmd";
import { readWavInfo, type WavInfo } from "./wav";

export const TARGET_SAMPLE_RATE = 24_000;
export const MAX_CLIP_SECONDS = 15;

export const AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a", ".aac", ".ogg", ".flac"];

export type NormalizeOptions = {
  runCommand?: CommandRunner;
  ffmpegPath?: string;
  concurrency?: number;
  signal?: AbortSignal;
  log?: Logger;
};

export type NormalizedClip = WavInfo & {
  /** source file name without extension; matches the preview key it came from */
  name: string;
  sourcePath: string;
  wavPath: string;
};

export type NormalizeSummary = {
  clips: NormalizedClip[];
  failed: { sourcePath: string; error: string }[];
};

// mono, fixed rate, PCM 16-bit, first MAX_CLIP_SECONDS only
export function ffmpegArgs(inPath: string, outPath: string) {
  return [
    "-hide_banner",
    "-y",
    "-i",
    inPath,
    "-vn",
    "-t",
    String(MAX_CLIP_SECONDS),
    "-ar",
    String(TARGET_SAMPLE_RATE),
    "-ac",
    "1",
    "-c:a",
    "pcm_s16le",
    outPath,
  ];
}

export function isAudioFile(file: string) {
  return AUDIO_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

export async function normalizeClip(inPath: string, outPath: string, opts: NormalizeOptions = {}): Promise<WavInfo> {
  const run = opts.runCommand ?? runCmd;
  try {
    await run(opts.ffmpegPath ?? "ffmpeg", ffmpegArgs(inPath, outPath), { signal: opts.signal });
  } catch (err) {
    throw new AppError({
      code: "TRANSCODE_FAILED",
      message: `ffmpeg could not convert ${path.basename(inPath)}: ${errorMessage(err).split("\n")[0]}`,
      retryable: false,
      details: { inPath },
      cause: err,
    });
  }
  return readWavInfo(outPath);
}

/**
 * Converts every audio file in `inputDir` into a model-ready WAV under `outputDir`.
 * A file that fails is logged and left out; a missing `inputDir` is thrown.
 */
export async function normalizeDirectory(
  inputDir: string,
  outputDir: string,
  opts: NormalizeOptions = {}
): Promise<NormalizeSummary> {
  const log = opts.log ?? componentLogger("convert");

  let entries: string[];
  try {
    entries = await fsp.readdir(inputDir);
  } catch (err) {
    throw new AppError({
      code: "TRANSCODE_FAILED",
      message: `Input directory not readable: ${inputDir}`,
      retryable: false,
      details: { inputDir },
      cause: err,
    });
  }

  await fsp.mkdir(outputDir, { recursive: true });

  const inputs = entries.filter(isAudioFile).sort();
  const limit = pLimit(Math.max(1, opts.concurrency ?? 2));
  const summary: NormalizeSummary = { clips: [], failed: [] };

  const results = await Promise.all(
    inputs.map((file) =>
      limit(async () => {
        const name = path.basename(file, path.extname(file));
        const sourcePath = path.join(inputDir, file);
        const wavPath = path.join(outputDir, `${name}.wav`);
        try {
          const info = await normalizeClip(sourcePath, wavPath, opts);
          log.debug({ file, ...info }, "clip normalized");
          return { ok: true as const, clip: { name, sourcePath, wavPath, ...info } };
        } catch (err) {
          await fsp.rm(wavPath, { force: true });
          log.warn({ file, err: errorMessage(err) }, "clip conversion failed");
          return { ok: false as const, sourcePath, error: errorMessage(err) };
        }
      })
    )
  );

  for (const r of results) {
    if (r.ok) summary.clips.push(r.clip);
    else summary.failed.push({ sourcePath: r.sourcePath, error: r.error });
  }

  log.info({ converted: summary.clips.length, failed: summary.failed.length }, "audio normalized");
  return summary;
}
