import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { TrackDescriptor } from "@trackprint/shared";

import type { Downloader, PreviewResolver } from "../../types/processing";
import { fetchPreviews, previewPath } from "./previews.module";
import { StaticPreviewResolver } from "./resolver";

const track = (id: string, name: string, artist: string, preview_url?: string): TrackDescriptor => ({
  id,
  name,
  artist,
  duration_ms: 180_000,
  ...(preview_url ? { preview_url } : {}),
});

let dir: string;

beforeEach(async () => {
  dir = await fsp.mkdtemp(path.join(os.tmpdir(), "trackprint-previews-"));
});

afterEach(async () => {
  await fsp.rm(dir, { recursive: true, force: true });
});

function fakeDownloader(failing: string[] = []) {
  return vi.fn<Downloader>(async (url, dest) => {
    if (failing.includes(url)) throw new Error("HTTP 404");
    await fsp.writeFile(dest, `audio from ${url}`);
  });
}

describe("fetchPreviews", () => {
  it("uses known preview urls and resolves the rest by name and artist", async () => {
    const resolver = new StaticPreviewResolver({ "Song B - Artist B": "https://cdn.test/b.mp3" });
    const resolve = vi.spyOn(resolver, "resolve");
    const download = fakeDownloader();
    const tracks = [track("a", "Song A", "Artist A", "https://cdn.test/a.mp3"), track("b", "Song B", "Artist B")];

    const summary = await fetchPreviews(tracks, { previewsDir: dir, resolver, download });

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith([{ name: "Song B", artist: "Artist B" }], undefined);
    expect(download).toHaveBeenCalledTimes(2);
    expect(summary).toMatchObject({
      status: "success",
      message: "Downloaded 2 previews out of 2 tracks",
      tracks_total: 2,
      tracks_downloaded: 2,
      tracks_failed: 0,
    });
    expect(summary.files).toEqual({
      a: path.join(dir, "Song A - Artist A.mp3"),
      b: path.join(dir, "Song B - Artist B.mp3"),
    });
    await expect(fsp.readFile(summary.files.b, "utf8")).resolves.toBe("audio from https://cdn.test/b.mp3");
  });

  it("does not download a clip that is already on disk", async () => {
    const resolver = new StaticPreviewResolver();
    const tracks = [track("a", "Song A", "Artist A", "https://cdn.test/a.mp3")];

    await fetchPreviews(tracks, { previewsDir: dir, resolver, download: fakeDownloader() });
    const second = fakeDownloader();
    const summary = await fetchPreviews(tracks, { previewsDir: dir, resolver, download: second });

    expect(second).not.toHaveBeenCalled();
    expect(summary.tracks_skipped).toBe(1);
    expect(summary.tracks_downloaded).toBe(0);
    expect(summary.files.a).toBe(previewPath(dir, tracks[0]));
  });

  it("keeps going when single downloads fail", async () => {
    const download = fakeDownloader(["https://cdn.test/bad.mp3"]);
    const tracks = [
      track("a", "Good", "X", "https://cdn.test/good.mp3"),
      track("b", "Bad", "Y", "https://cdn.test/bad.mp3"),
      track("c", "Missing", "Z"),
    ];

    const summary = await fetchPreviews(tracks, { previewsDir: dir, resolver: new StaticPreviewResolver(), download });

    expect(summary).toMatchObject({
      status: "success",
      tracks_downloaded: 1,
      tracks_failed: 1,
      tracks_unavailable: 1,
    });
    expect(Object.keys(summary.files)).toEqual(["a"]);
    expect((await fsp.readdir(dir)).sort()).toEqual(["Good - X.mp3"]);
  });

  it("reports the batch as failed when the resolver is unreachable", async () => {
    const resolver: PreviewResolver = {
      resolve: vi.fn(async () => {
        throw new Error("spawn preview-finder ENOENT");
      }),
    };
    const download = fakeDownloader();

    const summary = await fetchPreviews([track("a", "Song", "Artist")], { previewsDir: dir, resolver, download });

    expect(summary).toMatchObject({
      status: "error",
      message: "Preview resolver unavailable: spawn preview-finder ENOENT",
      tracks_total: 1,
      tracks_downloaded: 0,
    });
    expect(download).not.toHaveBeenCalled();
  });

  it("downloads a shared key once and maps it to every track", async () => {
    const download = fakeDownloader();
    const tracks = [
      track("a", "Same", "Artist", "https://cdn.test/1.mp3"),
      track("b", "Same", "Artist", "https://cdn.test/2.mp3"),
    ];

    const summary = await fetchPreviews(tracks, { previewsDir: dir, resolver: new StaticPreviewResolver(), download });

    expect(download).toHaveBeenCalledTimes(1);
    expect(summary.tracks_downloaded).toBe(2);
    expect(summary.files.a).toBe(summary.files.b);
  });

  it("downloads once when different keys sanitize to the same file", async () => {
    const download = fakeDownloader();
    const tracks = [
      track("a", "Back In Black", "AC/DC", "https://cdn.test/slash.mp3"),
      track("b", "Back In Black", "AC?DC", "https://cdn.test/question.mp3"),
    ];

    const summary = await fetchPreviews(tracks, { previewsDir: dir, resolver: new StaticPreviewResolver(), download });

    expect(download).toHaveBeenCalledTimes(1);
    expect(download).toHaveBeenCalledWith(
      "https://cdn.test/slash.mp3",
      path.join(dir, "Back In Black - AC_DC.mp3.part"),
      expect.objectContaining({ timeoutMs: 10_000 })
    );
    expect(summary.tracks_downloaded).toBe(2);
    expect(summary.files).toEqual({
      a: path.join(dir, "Back In Black - AC_DC.mp3"),
      b: path.join(dir, "Back In Black - AC_DC.mp3"),
    });
    expect(await fsp.readdir(dir)).toEqual(["Back In Black - AC_DC.mp3"]);
  });

  it("names files after a filesystem-safe key", () => {
    expect(previewPath("/p", { name: "Back/In: Black?", artist: "AC/DC" })).toBe(
      path.join("/p", "Back_In_ Black_ - AC_DC.mp3")
    );
    expect(previewPath("/p", { name: "Déjà Vu", artist: "Beyoncé" })).toBe(path.join("/p", "Déjà Vu - Beyoncé.mp3"));
  });
});
