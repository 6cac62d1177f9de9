import type { Logger, TrackDescriptor } from "@trackprint/shared";

import { UNKNOWN_ARTIST, UNKNOWN_TRACK, type RawTrack } from "../types/jobs";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function str(x: unknown): string {
  return typeof x === "string" ? x.trim() : "";
}

function num(x: unknown): number {
  return typeof x === "number" && Number.isFinite(x) ? x : 0;
}

function nonEmptyList(x: unknown): unknown[] | null {
  return Array.isArray(x) && x.length > 0 ? x : null;
}

/**
 * Shape precedence: top-level artists list, then nested track with artists,
 * then a plain artist string.
 */
export function classifyRawTrack(raw: unknown): RawTrack | null {
  if (!isRecord(raw)) return null;

  const artists = nonEmptyList(raw.artists);
  if (artists) return { kind: "flat-artist", record: raw, artists };

  if (isRecord(raw.track) && "artists" in raw.track) {
    return { kind: "nested-track", record: raw, track: raw.track, artists: nonEmptyList(raw.track.artists) ?? [] };
  }

  if (typeof raw.artist === "string") return { kind: "legacy-string-artist", record: raw, artist: raw.artist };

  return { kind: "unknown", record: raw };
}

function firstArtistName(artists: unknown[]): string {
  const first = artists[0];
  if (typeof first === "string") return first.trim() || UNKNOWN_ARTIST;
  if (isRecord(first)) return str(first.name) || UNKNOWN_ARTIST;
  return UNKNOWN_ARTIST;
}

function artistOf(t: RawTrack): string {
  switch (t.kind) {
    case "flat-artist":
      return firstArtistName(t.artists);
    case "nested-track":
      return firstArtistName(t.artists);
    case "legacy-string-artist":
      return t.artist.trim() || UNKNOWN_ARTIST;
    case "unknown":
      return UNKNOWN_ARTIST;
  }
}

/** top-level fields win; the nested track object fills in what is missing */
function field(t: RawTrack, key: string): unknown {
  const top = t.record[key];
  if (top !== undefined && top !== null && top !== "") return top;
  const nested = t.kind === "nested-track" ? t.track : isRecord(t.record.track) ? t.record.track : null;
  return nested ? nested[key] : undefined;
}

export function toDescriptor(t: RawTrack): TrackDescriptor | null {
  const id = str(field(t, "id"));
  if (!id) return null;

  const previewUrl = str(field(t, "preview_url"));
  return {
    id,
    name: str(field(t, "name")) || UNKNOWN_TRACK,
    artist: artistOf(t),
    duration_ms: num(field(t, "duration_ms")),
    ...(previewUrl ? { preview_url: previewUrl } : {}),
  };
}

/**
 * Normalizes whatever the catalog handed us. Records that are not objects, or
 * that carry no track id at all, are dropped with a warning.
 */
export function normalizeTracks(raw: unknown[], log?: Logger): TrackDescriptor[] {
  const out: TrackDescriptor[] = [];

  raw.forEach((item, i) => {
    const classified = classifyRawTrack(item);
    if (!classified) {
      log?.warn({ index: i }, "skipping invalid track record");
      return;
    }

    const descriptor = toDescriptor(classified);
    if (!descriptor) {
      log?.warn({ index: i, kind: classified.kind }, "skipping track without id");
      return;
    }

    log?.debug({ index: i, kind: classified.kind, descriptor }, "track normalized");
    out.push(descriptor);
  });

  return out;
}

export function previewKey(t: Pick<TrackDescriptor, "name" | "artist">) {
  return `${t.name} - ${t.artist}`;
}

/** letters, digits, space, `-` and `_` survive; everything else becomes `_` */
export function sanitizeFilename(name: string) {
  return name.replace(/[^\p{L}\p{N} _-]/gu, "_");
}
