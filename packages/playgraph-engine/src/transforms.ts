import type { Cutoff, DedupKey, NodeParamsMap, SortKey, TimeFilterParams, TransformKind } from "./registry.js";
import type { Track, TrackSet } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const RELEASE_DATE_PATTERN = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

export interface TransformEnvironment {
  /** Evaluation time used by relative cutoffs */
  readonly now: Date;
  /** Liked track ids, consulted for tracks whose `liked` is unknown */
  readonly likedIds?: ReadonlySet<string>;
}

export type Transform<K extends TransformKind> = (
  inputs: readonly TrackSet[],
  params: NodeParamsMap[K],
  environment: TransformEnvironment
) => TrackSet;

/** Track data that a transformation cannot interpret. */
export class TrackDataError extends Error {
  readonly trackId: string;

  constructor(trackId: string, message: string) {
    super(message);
    this.name = "TrackDataError";
    this.trackId = trackId;
  }
}

/**
 * Parses "YYYY", "YYYY-MM" or "YYYY-MM-DD" to the UTC epoch milliseconds of
 * its first day. Returns undefined for anything else, including impossible
 * calendar dates.
 */
export function parseReleaseDate(text: string): number | undefined {
  const match = RELEASE_DATE_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = match[2] === undefined ? 1 : Number(match[2]);
  const day = match[3] === undefined ? 1 : Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return undefined;
  }
  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCDate() !== day) {
    return undefined;
  }
  return date.getTime();
}

function releaseTimestamp(track: Track): number | undefined {
  if (track.releaseDate === undefined) {
    return undefined;
  }
  const timestamp = parseReleaseDate(track.releaseDate);
  if (timestamp === undefined) {
    throw new TrackDataError(track.id, `track ${track.id} has an unparsable release date "${track.releaseDate}"`);
  }
  return timestamp;
}

export function resolveCutoff(cutoff: Cutoff, now: Date): number {
  return cutoff.kind === "relative" ? now.getTime() - cutoff.daysAgo * DAY_MS : cutoff.timestamp;
}

function filterByTimestamp(
  tracks: TrackSet,
  params: TimeFilterParams,
  now: Date,
  timestampOf: (track: Track) => number | undefined
): TrackSet {
  const cutoff = resolveCutoff(params.cutoff, now);
  return tracks.filter((track) => {
    const timestamp = timestampOf(track);
    if (timestamp === undefined) {
      return false;
    }
    return params.keepBefore ? timestamp < cutoff : timestamp >= cutoff;
  });
}

export function concatTracks(inputs: readonly TrackSet[]): TrackSet {
  return inputs.flat();
}

/** One track from each input per round, in input order, until all run out. */
export function interleaveTracks(inputs: readonly TrackSet[]): TrackSet {
  const longest = Math.max(0, ...inputs.map((tracks) => tracks.length));
  const output: Track[] = [];
  for (let round = 0; round < longest; round += 1) {
    for (const tracks of inputs) {
      if (round < tracks.length) {
        output.push(tracks[round]);
      }
    }
  }
  return output;
}

type SortValue = string | number | undefined;

function sortValue(track: Track, key: SortKey): SortValue {
  switch (key) {
    case "time_added":
      return track.addedAt?.getTime();
    case "name":
      return track.name;
    case "artist":
      return track.artist;
    case "album":
      return track.album;
    case "release_date":
      return releaseTimestamp(track);
  }
}

/** Orders by Unicode code point; `<` on strings compares UTF-16 code units. */
export function compareCodePoints(left: string, right: string): number {
  let i = 0;
  let j = 0;
  while (i < left.length && j < right.length) {
    const a = left.codePointAt(i) ?? 0;
    const b = right.codePointAt(j) ?? 0;
    if (a !== b) {
      return a < b ? -1 : 1;
    }
    i += a > 0xffff ? 2 : 1;
    j += b > 0xffff ? 2 : 1;
  }
  const leftDone = i >= left.length;
  const rightDone = j >= right.length;
  if (leftDone && rightDone) {
    return 0;
  }
  return leftDone ? -1 : 1;
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  return compareCodePoints(String(a), String(b));
}

/** Stable; tracks without a value for the key go last in either direction. */
export function sortTracks(tracks: TrackSet, sortKey: SortKey, sortDesc: boolean): TrackSet {
  const keyed = tracks.map((track) => ({ track, value: sortValue(track, sortKey) }));
  keyed.sort((left, right) => {
    if (left.value === undefined || right.value === undefined) {
      return (left.value === undefined ? 1 : 0) - (right.value === undefined ? 1 : 0);
    }
    const order = compareValues(left.value, right.value);
    return sortDesc ? -order : order;
  });
  return keyed.map(({ track }) => track);
}

export function dedupKeyOf(track: Track, dedupBy: DedupKey): string {
  return dedupBy === "id" ? track.id : JSON.stringify([track.name, track.album, track.artist]);
}

/** First occurrence wins. */
export function dedupTracks(tracks: TrackSet, dedupBy: DedupKey): TrackSet {
  const seen = new Set<string>();
  return tracks.filter((track) => {
    const key = dedupKeyOf(track, dedupBy);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

export function isTrackLiked(track: Track, likedIds?: ReadonlySet<string>): boolean {
  if (track.liked !== undefined) {
    return track.liked;
  }
  return likedIds?.has(track.id) ?? false;
}

function singleInput(inputs: readonly TrackSet[]): TrackSet {
  return inputs[0] ?? [];
}

type TransformRegistry = { [K in TransformKind]: Transform<K> };

export const TRANSFORMS: TransformRegistry = {
  is_liked: (inputs, _params, { likedIds }) => singleInput(inputs).filter((track) => isTrackLiked(track, likedIds)),
  filter_time_added: (inputs, params, { now }) =>
    filterByTimestamp(singleInput(inputs), params, now, (track) => track.addedAt?.getTime()),
  filter_release_date: (inputs, params, { now }) => filterByTimestamp(singleInput(inputs), params, now, releaseTimestamp),
  combiner: (inputs, { combineType }) => (combineType === "interleave" ? interleaveTracks(inputs) : concatTracks(inputs)),
  sort: (inputs, { sortKey, sortDesc }) => sortTracks(singleInput(inputs), sortKey, sortDesc),
  dedup: (inputs, { dedupBy }) => dedupTracks(singleInput(inputs), dedupBy),
  limit: (inputs, { maxSize }) => singleInput(inputs).slice(0, maxSize),
  output: (inputs) => singleInput(inputs),
  combine_sort_dedup_output: (inputs, { sortKey, sortDesc, dedupBy }) =>
    dedupTracks(sortTracks(concatTracks(inputs), sortKey, sortDesc), dedupBy),
};

export function runTransform<K extends TransformKind>(
  kind: K,
  inputs: readonly TrackSet[],
  params: NodeParamsMap[K],
  environment: TransformEnvironment
): TrackSet {
  const transform: Transform<K> = TRANSFORMS[kind];
  return transform(inputs, params, environment);
}
