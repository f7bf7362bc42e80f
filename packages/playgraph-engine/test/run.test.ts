import { KeyedLock } from "@playgraph/common";
import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  CyclicGraphError,
  InMemoryPlaylistProvider,
  PlaylistRun,
  TemplateExpansionError,
  isRunSuccessful,
  runPlaylistGraph,
  type PlaylistRunOptions,
  type RawNodeMapping,
  type RunState,
} from "@playgraph/engine";
import { NO_WAIT, track } from "./helpers.js";

const NOW = new Date("2024-06-15T12:00:00Z");

function options(provider: InMemoryPlaylistProvider, extra: Partial<PlaylistRunOptions> = {}): PlaylistRunOptions {
  return {
    provider,
    now: () => NOW,
    sleep: NO_WAIT,
    retry: { attempts: 2, delayMs: 0 },
    playlistLock: new KeyedLock(),
    ...extra,
  };
}

const GENRE_GRAPH: RawNodeMapping = {
  liked: { type: "liked_tracks" },
  genres: {
    type: "dynamic_template",
    template: {
      "{g} Source": { type: "playlist", uri: "{uri}" },
      "{g} Liked": { type: "is_liked", input: "{g} Source" },
      "{g} Output": { type: "output", input: "{g} Liked", playlist_name: "{g} Output" },
    },
    instances: [
      { g: "Rock", uri: "uri:rock" },
      { g: "Pop", uri: "uri:pop" },
    ],
  },
};

describe("runPlaylistGraph", () => {
  it("runs a templated graph end to end", async () => {
    const provider = new InMemoryPlaylistProvider({
      playlists: {
        "uri:rock": [track("r1"), track("r2")],
        "uri:pop": [track("p1"), track("p2")],
      },
      liked: [track("r2"), track("p1")],
    });
    const states: RunState[] = [];

    const { report, tracks } = await runPlaylistGraph(
      GENRE_GRAPH,
      options(provider, { onStateChange: (state) => states.push(state) })
    );

    expect(states).toEqual(["expanding", "building", "evaluating", "reconciling", "done"]);
    expect(report.state).toBe("done");
    expect(Object.keys(report.outputs)).toEqual(["Rock Output", "Pop Output"]);
    expect(report.outputs["Rock Output"]).toEqual({
      status: "success",
      playlistName: "Rock Output",
      addedCount: 1,
      removedCount: 0,
      movedCount: 0,
      trackCount: 1,
    });
    expect(provider.playlistIds("Rock Output")).toEqual(["r2"]);
    expect(provider.playlistIds("Pop Output")).toEqual(["p1"]);
    expect(tracks.get("Pop Output")?.map((entry) => entry.id)).toEqual(["p1"]);
    expect(isRunSuccessful(report)).toBe(true);
  });

  it("counts remote calls", async () => {
    const provider = new InMemoryPlaylistProvider({ liked: [track("a")] });
    const { report } = await runPlaylistGraph(
      { liked: { type: "liked_tracks" }, out: { type: "output", input: "liked", playlist_name: "Likes" } },
      options(provider)
    );
    // fetch, find, read, add, verify
    expect(report.apiCalls).toBe(5);
    expect(provider.calls).toHaveLength(5);
  });

  it("fails fast on configuration errors without touching the provider", async () => {
    const provider = new InMemoryPlaylistProvider();
    const states: RunState[] = [];
    const run = new PlaylistRun(
      {
        a: { type: "sort", input: "b", sort_key: "name" },
        b: { type: "output", input: "a", playlist_name: "Loop" },
      },
      options(provider, { onStateChange: (state) => states.push(state) })
    );

    await expect(run.execute()).rejects.toBeInstanceOf(CyclicGraphError);
    expect(run.state).toBe("failed");
    expect(states).toEqual(["expanding", "building", "failed"]);
    expect(provider.calls).toEqual([]);
  });

  it("fails in the expanding state on template errors", async () => {
    const run = new PlaylistRun(
      { t: { type: "dynamic_template", template: { "{x}": { type: "liked_tracks" } }, instances: [{}] } },
      options(new InMemoryPlaylistProvider())
    );
    await expect(run.execute()).rejects.toBeInstanceOf(TemplateExpansionError);
    expect(run.state).toBe("failed");
  });

  it("requires at least one output node", async () => {
    await expect(
      runPlaylistGraph({ liked: { type: "liked_tracks" } }, options(new InMemoryPlaylistProvider()))
    ).rejects.toThrow(new ConfigurationError("Node graph defines no output nodes"));
  });

  it("executes a run only once", async () => {
    const run = new PlaylistRun(
      { liked: { type: "liked_tracks" }, out: { type: "output", input: "liked", playlist_name: "L" } },
      options(new InMemoryPlaylistProvider())
    );
    await run.execute();
    await expect(run.execute()).rejects.toThrow("A run can only be executed once");
  });

  it("reports failed outputs and still writes the others", async () => {
    const provider = new InMemoryPlaylistProvider({ playlists: { "uri:ok": [track("a")] } });
    const { report } = await runPlaylistGraph(
      {
        gone: { type: "playlist", uri: "uri:gone" },
        ok: { type: "playlist", uri: "uri:ok" },
        broken: { type: "output", input: "gone", playlist_name: "Broken" },
        fine: { type: "output", input: "ok", playlist_name: "Fine" },
      },
      options(provider)
    );

    expect(report.state).toBe("done");
    expect(report.outputs.broken).toEqual({
      status: "failed",
      playlistName: "Broken",
      addedCount: 0,
      removedCount: 0,
      movedCount: 0,
      trackCount: 0,
      error: "skipped because node <gone> failed: Playlist uri:gone does not exist",
    });
    expect(report.outputs.fine.status).toBe("success");
    expect(provider.playlistIds("Fine")).toEqual(["a"]);
    expect(provider.playlistIds("Broken")).toBeUndefined();
    expect(isRunSuccessful(report)).toBe(false);
  });

  it("plans without writing in a dry run", async () => {
    const provider = new InMemoryPlaylistProvider({ liked: [track("a"), track("b")] });
    const { report } = await runPlaylistGraph(
      { liked: { type: "liked_tracks" }, out: { type: "output", input: "liked", playlist_name: "Likes" } },
      options(provider, { dryRun: true })
    );

    expect(report.outputs.out).toEqual({
      status: "planned",
      playlistName: "Likes",
      addedCount: 0,
      removedCount: 0,
      movedCount: 0,
      trackCount: 2,
    });
    expect(provider.calls).toEqual(["fetchLikedTracks"]);
  });

  it("ends in the failed state when cancelled", async () => {
    const provider = new InMemoryPlaylistProvider({ liked: [track("a")] });
    const controller = new AbortController();
    controller.abort();

    const { report } = await runPlaylistGraph(
      { liked: { type: "liked_tracks" }, out: { type: "output", input: "liked", playlist_name: "Likes" } },
      options(provider, { signal: controller.signal })
    );

    expect(report.state).toBe("failed");
    expect(report.outputs.out.error).toBe("skipped because node <liked> failed: Run was cancelled");
    expect(provider.calls).toEqual([]);
  });

  it("runs the compound node from playlist URIs", async () => {
    const provider = new InMemoryPlaylistProvider({
      playlists: {
        "uri:a": [track("t2", { name: "b" }), track("t1", { name: "a" })],
        "uri:b": [track("t1", { name: "a" }), track("t3", { name: "c" })],
      },
    });
    const { report } = await runPlaylistGraph(
      {
        weekly: {
          type: "combine_sort_dedup_output",
          input_uris: ["uri:a", "uri:b"],
          output_playlist_name: "Weekly",
          sort_key: "name",
        },
      },
      options(provider)
    );

    expect(report.outputs.weekly.trackCount).toBe(3);
    expect(provider.playlistIds("Weekly")).toEqual(["t1", "t2", "t3"]);
  });
});
