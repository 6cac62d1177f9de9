import fsp from "node:fs/promises";
import { vi } from "vitest";

import type { StageReport } from "@trackprint/shared";

import type { CommandRunner } from "../lib/runCmd";
import type { Downloader, ProgressReporter } from "../types/processing";

/** canonical 44-byte PCM header followed by silence */
export function wavBytes(sampleRate: number, channels: number, seconds: number) {
  const bits = 16;
  const byteRate = sampleRate * channels * (bits / 8);
  const dataBytes = Math.round(seconds * byteRate);
  const buf = Buffer.alloc(44 + dataBytes);
  buf.write("RIFF", 0, "ascii");
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write("WAVE", 8, "ascii");
  buf.write("fmt ", 12, "ascii");
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20);
  buf.writeUInt16LE(channels, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(byteRate, 28);
  buf.writeUInt16LE(channels * (bits / 8), 32);
  buf.writeUInt16LE(bits, 34);
  buf.write("data", 36, "ascii");
  buf.writeUInt32LE(dataBytes, 40);
  return buf;
}

function argAfter(args: string[], flag: string) {
  return Number(args[args.indexOf(flag) + 1]);
}

/**
 * Stands in for ffmpeg. Source files hold their own duration in seconds as text;
 * a source reading "corrupt" fails the way a broken input would.
 */
export function fakeFfmpeg() {
  return vi.fn<CommandRunner>(async (_cmd, args) => {
    const inPath = args[args.indexOf("-i") + 1] ?? "";
    const outPath = args[args.length - 1] ?? "";
    const src = (await fsp.readFile(inPath, "utf8")).trim();
    if (src === "corrupt") throw new Error("ffmpeg failed code=1\n\ninvalid data found");
    const seconds = Math.min(Number(src), argAfter(args, "-t"));
    await fsp.writeFile(outPath, wavBytes(argAfter(args, "-ar"), argAfter(args, "-ac"), seconds));
    return { stdout: "", stderr: "" };
  });
}

/** writes `body` (default: a 30 second source) for every url not listed as failing */
export function fakeDownloader(opts: { failing?: string[]; body?: string } = {}) {
  return vi.fn<Downloader>(async (url, dest) => {
    if (opts.failing?.includes(url)) throw new Error("HTTP 404");
    await fsp.writeFile(dest, opts.body ?? "30");
  });
}

export function progressRecorder(): ProgressReporter & { reports: StageReport[] } {
  const reports: StageReport[] = [];
  return {
    reports,
    report: async (r) => {
      reports.push(r);
    },
  };
}
