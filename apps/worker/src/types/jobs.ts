type RawRecord = Record<string, unknown>;

/** `{id, name, artists: [{name} | "name", ...]}` as returned by the catalog API */
export type FlatArtistTrack = {
  kind: "flat-artist";
  record: RawRecord;
  artists: unknown[];
};

/** saved-tracks envelope: `{added_at, track: {id, name, artists, ...}}` */
export type NestedTrack = {
  kind: "nested-track";
  record: RawRecord;
  track: RawRecord;
  artists: unknown[];
};

/** older payloads carried a single artist string */
export type LegacyStringArtistTrack = {
  kind: "legacy-string-artist";
  record: RawRecord;
  artist: string;
};

/** an object we do not recognise; sentinels fill the gaps */
export type UnknownTrack = {
  kind: "unknown";
  record: RawRecord;
};

export type RawTrack = FlatArtistTrack | NestedTrack | LegacyStringArtistTrack | UnknownTrack;

export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_TRACK = "Unknown Track";
