import { describe, expect, it } from "vitest";

import {
  TRANSFORMS,
  TrackDataError,
  concatTracks,
  dedupTracks,
  interleaveTracks,
  parseReleaseDate,
  runTransform,
  sortTracks,
} from "@playgraph/engine";
import { ids, track } from "./helpers.js";

const NOW = new Date("2024-06-15T12:00:00Z");
const DAY_MS = 24 * 60 * 60 * 1000;

describe("combiner", () => {
  const playlistA = [track("t1"), track("t2"), track("t3")];
  const playlistB = [track("t3"), track("t4")];

  it("concatenates inputs in order, keeping duplicates", () => {
    expect(ids(concatTracks([playlistA, playlistB]))).toEqual(["t1", "t2", "t3", "t3", "t4"]);
  });

  it("dedups the concatenation to the first occurrences", () => {
    expect(ids(dedupTracks(concatTracks([playlistA, playlistB]), "id"))).toEqual(["t1", "t2", "t3", "t4"]);
  });

  it("interleaves round-robin until every input is exhausted", () => {
    const result = interleaveTracks([[track("1"), track("2"), track("3")], [track("4"), track("5")], [track("6")]]);
    expect(ids(result)).toEqual(["1", "4", "6", "2", "5", "3"]);
  });

  it("interleaves nothing into nothing", () => {
    expect(interleaveTracks([])).toEqual([]);
  });

  it("dispatches on combine_type", () => {
    const inputs = [[track("a"), track("b")], [track("c")]];
    expect(ids(runTransform("combiner", inputs, { combineType: "interleave" }, { now: NOW }))).toEqual(["a", "c", "b"]);
    expect(ids(runTransform("combiner", inputs, { combineType: "concat" }, { now: NOW }))).toEqual(["a", "b", "c"]);
  });
});

describe("sortTracks", () => {
  it("sorts by name ascending", () => {
    const result = sortTracks([track("1", { name: "b" }), track("2", { name: "a" }), track("3", { name: "c" })], "name", false);
    expect(result.map((entry) => entry.name)).toEqual(["a", "b", "c"]);
  });

  it("keeps equal keys in input order in both directions", () => {
    const input = [
      track("x1", { artist: "Same" }),
      track("y", { artist: "Other" }),
      track("x2", { artist: "Same" }),
    ];
    expect(ids(sortTracks(input, "artist", false))).toEqual(["y", "x1", "x2"]);
    expect(ids(sortTracks(input, "artist", true))).toEqual(["x1", "x2", "y"]);
  });

  it("puts tracks without the key last either way", () => {
    const input = [
      track("none"),
      track("old", { addedAt: new Date("2020-01-01T00:00:00Z") }),
      track("new", { addedAt: new Date("2024-01-01T00:00:00Z") }),
    ];
    expect(ids(sortTracks(input, "time_added", false))).toEqual(["old", "new", "none"]);
    expect(ids(sortTracks(input, "time_added", true))).toEqual(["new", "old", "none"]);
  });

  it("compares partial release dates by their first day", () => {
    const input = [
      track("day", { releaseDate: "2001-03-02" }),
      track("year", { releaseDate: "2001" }),
      track("month", { releaseDate: "2001-03" }),
    ];
    expect(ids(sortTracks(input, "release_date", false))).toEqual(["year", "month", "day"]);
  });

  it("compares strings by code point", () => {
    const input = [track("lower", { name: "abc" }), track("upper", { name: "Abc" })];
    expect(ids(sortTracks(input, "name", false))).toEqual(["upper", "lower"]);

    const wide = [track("emoji", { name: "\u{1F600}" }), track("fullwidth", { name: "\uFF5E" }), track("prefix", { name: "" })];
    expect(ids(sortTracks(wide, "name", false))).toEqual(["prefix", "fullwidth", "emoji"]);
    expect(ids(sortTracks(wide, "name", true))).toEqual(["emoji", "fullwidth", "prefix"]);
  });

  it("sorts release dates before the year 100 by their real year", () => {
    const input = [track("twenties", { releaseDate: "1920" }), track("ancient", { releaseDate: "0050" })];
    expect(ids(sortTracks(input, "release_date", false))).toEqual(["ancient", "twenties"]);
  });

  it("produces the same ordering when run twice with limit", () => {
    const input = [track("1", { name: "m" }), track("2", { name: "m" }), track("3", { name: "a" }), track("4", { name: "z" })];
    const once = runTransform("limit", [sortTracks(input, "name", false)], { maxSize: 3 }, { now: NOW });
    const twice = runTransform("limit", [sortTracks(input, "name", false)], { maxSize: 3 }, { now: NOW });
    expect(JSON.stringify(once)).toBe(JSON.stringify(twice));
    expect(ids(once)).toEqual(["3", "1", "2"]);
  });
});

describe("dedupTracks", () => {
  it("is idempotent", () => {
    const input = [track("a"), track("b"), track("a"), track("c"), track("b")];
    const once = dedupTracks(input, "id");
    expect(dedupTracks(once, "id")).toEqual(once);
    expect(ids(once)).toEqual(["a", "b", "c"]);
  });

  it("keeps the first of conflicting duplicates", () => {
    const first = track("a", { addedAt: new Date("2024-01-01T00:00:00Z") });
    const second = track("a", { addedAt: new Date("2020-01-01T00:00:00Z") });
    expect(dedupTracks([first, second], "id")).toEqual([first]);
  });

  it("matches on name, album and artist when deduping by metadata", () => {
    const input = [
      track("id-1", { name: "Song", album: "LP", artist: "Band" }),
      track("id-2", { name: "Song", album: "LP", artist: "Band" }),
      track("id-3", { name: "Song", album: "Single", artist: "Band" }),
    ];
    expect(ids(dedupTracks(input, "metadata"))).toEqual(["id-1", "id-3"]);
  });
});

describe("time filters", () => {
  const tracks = [
    track("recent", { addedAt: new Date(NOW.getTime() - 2 * DAY_MS) }),
    track("boundary", { addedAt: new Date(NOW.getTime() - 7 * DAY_MS) }),
    track("old", { addedAt: new Date(NOW.getTime() - 30 * DAY_MS) }),
    track("unknown"),
  ];

  it("keeps tracks added at or after the relative cutoff", () => {
    const result = TRANSFORMS.filter_time_added([tracks], { cutoff: { kind: "relative", daysAgo: 7 }, keepBefore: false }, { now: NOW });
    expect(ids(result)).toEqual(["recent", "boundary"]);
  });

  it("keeps tracks strictly before the cutoff with keep_before", () => {
    const result = TRANSFORMS.filter_time_added([tracks], { cutoff: { kind: "relative", daysAgo: 7 }, keepBefore: true }, { now: NOW });
    expect(ids(result)).toEqual(["old"]);
  });

  it("filters release dates against an absolute cutoff", () => {
    const released = [
      track("2019", { releaseDate: "2019" }),
      track("2020-01", { releaseDate: "2020-01" }),
      track("2021-06-30", { releaseDate: "2021-06-30" }),
      track("undated"),
    ];
    const cutoff = { kind: "absolute" as const, timestamp: Date.UTC(2020, 0, 1), text: "2020-01-01" };
    expect(ids(TRANSFORMS.filter_release_date([released], { cutoff, keepBefore: false }, { now: NOW }))).toEqual([
      "2020-01",
      "2021-06-30",
    ]);
    expect(ids(TRANSFORMS.filter_release_date([released], { cutoff, keepBefore: true }, { now: NOW }))).toEqual(["2019"]);
  });

  it("fails on an unparsable release date", () => {
    const cutoff = { kind: "relative" as const, daysAgo: 1 };
    expect(() =>
      TRANSFORMS.filter_release_date([[track("bad", { releaseDate: "spring 1999" })]], { cutoff, keepBefore: false }, { now: NOW })
    ).toThrow(new TrackDataError("bad", 'track bad has an unparsable release date "spring 1999"'));
  });
});

describe("parseReleaseDate", () => {
  it("resolves partial dates to the first day in UTC", () => {
    expect(parseReleaseDate("1999")).toBe(Date.UTC(1999, 0, 1));
    expect(parseReleaseDate("1999-07")).toBe(Date.UTC(1999, 6, 1));
    expect(parseReleaseDate("1999-07-21")).toBe(Date.UTC(1999, 6, 21));
  });

  it("keeps years below 100 as written", () => {
    expect(parseReleaseDate("0050")).toBe(Date.parse("0050-01-01T00:00:00Z"));
    expect(parseReleaseDate("0000")).toBe(Date.parse("0000-01-01T00:00:00Z"));
    expect(parseReleaseDate("0004-02-29")).toBe(Date.parse("0004-02-29T00:00:00Z"));
  });

  it("rejects impossible or malformed dates", () => {
    expect(parseReleaseDate("1999-13")).toBeUndefined();
    expect(parseReleaseDate("2023-02-30")).toBeUndefined();
    expect(parseReleaseDate("99")).toBeUndefined();
    expect(parseReleaseDate("")).toBeUndefined();
  });
});

describe("is_liked", () => {
  it("uses the known flag before the liked-id set", () => {
    const input = [track("a", { liked: true }), track("b", { liked: false }), track("c"), track("d")];
    const result = TRANSFORMS.is_liked([input], {}, { now: NOW, likedIds: new Set(["b", "c"]) });
    expect(ids(result)).toEqual(["a", "c"]);
  });

  it("drops unknown tracks when no liked-id set is given", () => {
    expect(ids(TRANSFORMS.is_liked([[track("a"), track("b", { liked: true })]], {}, { now: NOW }))).toEqual(["b"]);
  });
});

describe("compound sink", () => {
  it("concatenates, sorts and dedups", () => {
    const inputs = [
      [track("t2", { name: "b" }), track("t1", { name: "a" })],
      [track("t1", { name: "a" }), track("t3", { name: "c" })],
    ];
    const result = TRANSFORMS.combine_sort_dedup_output(
      inputs,
      { playlistName: "Mix", public: false, sortKey: "name", sortDesc: true, dedupBy: "id" },
      { now: NOW }
    );
    expect(ids(result)).toEqual(["t3", "t2", "t1"]);
  });
});
