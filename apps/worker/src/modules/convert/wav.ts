import fsp from "node:fs/promises";

import { AppError } from "@trackprint/shared";

export type WavInfo = {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  durationSec: number;
};

// ffmpeg puts fmt/LIST/data well inside this
const HEADER_BYTES = 64 * 1024;

function badWav(file: string, reason: string) {
  return new AppError({
    code: "TRANSCODE_FAILED",
    message: `Not a usable WAV file (${reason})`,
    retryable: false,
    details: { file },
  });
}

export function parseWavHeader(buf: Buffer, file = "<buffer>"): WavInfo {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw badWav(file, "missing RIFF/WAVE header");
  }

  let fmt: Omit<WavInfo, "durationSec"> & { byteRate: number } | null = null;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      if (body + 16 > buf.length) throw badWav(file, "truncated fmt chunk");
      fmt = {
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        byteRate: buf.readUInt32LE(body + 8),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!fmt) throw badWav(file, "data chunk before fmt chunk");
      if (fmt.byteRate === 0) throw badWav(file, "zero byte rate");
      return {
        sampleRate: fmt.sampleRate,
        channels: fmt.channels,
        bitsPerSample: fmt.bitsPerSample,
        durationSec: size / fmt.byteRate,
      };
    }

    // chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw badWav(file, "no data chunk");
}

export async function readWavInfo(file: string): Promise<WavInfo> {
  const fh = await fsp.open(file, "r");
  try {
    const buf = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await fh.read(buf, 0, HEADER_BYTES, 0);
    return parseWavHeader(buf.subarray(0, bytesRead), file);
  } finally {
    await fh.close();
  }
}
