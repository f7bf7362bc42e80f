import { describe, expect, it } from "vitest";

import {
  CyclicGraphError,
  InvalidNodeError,
  UnknownReferenceError,
  buildGraph,
  compileNodeGraph,
  expandNodeMapping,
  parseNode,
  type DependencyGraph,
  type RawNodeMapping,
} from "@playgraph/engine";

function build(mapping: RawNodeMapping): DependencyGraph {
  return buildGraph(expandNodeMapping(mapping));
}

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("expected the action to throw");
}

describe("parseNode", () => {
  it("validates and camel-cases parameters", () => {
    const spec = parseNode("recent", { type: "filter_time_added", input: "liked", days_ago: "30" }, 2);
    expect(spec).toEqual({
      name: "recent",
      kind: "filter_time_added",
      inputs: ["liked"],
      params: { cutoff: { kind: "relative", daysAgo: 30 }, keepBefore: false },
      index: 2,
    });
  });

  it("applies parameter defaults", () => {
    expect(parseNode("o", { type: "output", input: "x", playlist_name: "Mix" }, 0).params).toEqual({
      playlistName: "Mix",
      public: false,
    });
    expect(parseNode("c", { type: "combiner", inputs: ["a", "b"] }, 0).params).toEqual({ combineType: "concat" });
  });

  it("parses absolute cutoffs", () => {
    expect(
      parseNode("old", { type: "filter_release_date", input: "x", cutoff_time: "2020-01-01", keep_before: true }, 0).params
    ).toEqual({
      cutoff: { kind: "absolute", timestamp: Date.UTC(2020, 0, 1), text: "2020-01-01" },
      keepBefore: true,
    });
  });

  it("rejects unknown and unexpanded types", () => {
    expect(() => parseNode("n", { type: "shuffle" }, 0)).toThrow('Node <n>: type: unknown node type "shuffle"');
    expect(() => parseNode("n", {}, 0)).toThrow("Node <n>: type: node type is missing");
    expect(() => parseNode("n", { type: "dynamic_template", template: {}, instances: [] }, 0)).toThrow(InvalidNodeError);
  });

  it("names the offending field", () => {
    const error = captureError(() => parseNode("s", { type: "sort", input: "x", sort_key: "tempo" }, 0));
    expect(error).toBeInstanceOf(InvalidNodeError);
    expect(error).toMatchObject({ node: "s", field: "sort_key" });
    expect(() => parseNode("l", { type: "limit", input: "x" }, 0)).toThrow(
      "Node <l>: max_size: required parameter is missing"
    );
    expect(() => parseNode("p", { type: "playlist", uri: "u", colour: "red" }, 0)).toThrow(
      "Node <p>: colour: unknown parameter"
    );
  });

  it("requires exactly one cutoff form", () => {
    expect(() => parseNode("f", { type: "filter_time_added", input: "x" }, 0)).toThrow(
      "Node <f>: days_ago: exactly one of days_ago or cutoff_time must be given"
    );
    expect(() =>
      parseNode("f", { type: "filter_time_added", input: "x", days_ago: 3, cutoff_time: "2020-01-01" }, 0)
    ).toThrow(InvalidNodeError);
    expect(() => parseNode("f", { type: "filter_time_added", input: "x", cutoff_time: "someday" }, 0)).toThrow(
      'Node <f>: cutoff_time: "someday" is not an ISO-8601 date or date-time'
    );
  });

  it("checks the input declaration against the arity", () => {
    expect(() => parseNode("p", { type: "playlist", uri: "u", input: "x" }, 0)).toThrow(
      "Node <p>: inputs: playlist nodes take no inputs"
    );
    expect(() => parseNode("s", { type: "sort", inputs: ["a", "b"], sort_key: "name" }, 0)).toThrow(
      "Node <s>: input: sort nodes take exactly one input"
    );
    expect(() => parseNode("c", { type: "combiner", inputs: [] }, 0)).toThrow(
      "Node <c>: inputs: combiner nodes need at least one input"
    );
    expect(() => parseNode("d", { type: "dedup", input: "a", inputs: ["a"] }, 0)).toThrow(
      "Node <d>: inputs: declare either input or inputs, not both"
    );
  });
});

describe("buildGraph", () => {
  it("allows forward references and orders inputs first", () => {
    const graph = build({
      out: { type: "output", input: "sorted", playlist_name: "Out" },
      sorted: { type: "sort", input: "all", sort_key: "name" },
      all: { type: "combiner", inputs: ["a", "b"] },
      a: { type: "playlist", uri: "uri:a" },
      b: { type: "playlist", uri: "uri:b" },
    });

    expect(graph.order).toEqual(["a", "b", "all", "sorted", "out"]);
    expect(graph.dependents.get("a")).toEqual(["all"]);
    expect(graph.outputs.map((spec) => spec.name)).toEqual(["out"]);
  });

  it("breaks ties by definition order", () => {
    const graph = build({
      z: { type: "liked_tracks" },
      y: { type: "all_tracks" },
      fromY: { type: "is_liked", input: "y" },
      fromZ: { type: "is_liked", input: "z" },
    });
    expect(graph.order).toEqual(["z", "y", "fromY", "fromZ"]);
  });

  it("breaks ties by definition order for integer-like names given as a Map", () => {
    const graph = build(
      new Map<string, unknown>([
        ["10", { type: "liked_tracks" }],
        ["2", { type: "all_tracks" }],
        ["out", { type: "output", input: "10", playlist_name: "Out" }],
      ])
    );
    expect(graph.order).toEqual(["10", "2", "out"]);
  });

  it("names the missing reference", () => {
    const error = captureError(() => build({ out: { type: "output", input: "Missing", playlist_name: "Out" } }));
    expect(error).toBeInstanceOf(UnknownReferenceError);
    expect(error).toMatchObject({ node: "out", reference: "Missing" });
    expect(error).toHaveProperty("message", 'Node <out> references undefined input "Missing"');
  });

  it("rejects cycles with the full path", () => {
    expect(() =>
      build({
        a: { type: "sort", input: "b", sort_key: "name" },
        b: { type: "dedup", input: "a" },
      })
    ).toThrow(new CyclicGraphError(["a", "b", "a"]));
  });

  it("treats a self reference as a cycle", () => {
    expect(() => build({ loop: { type: "combiner", inputs: ["src", "loop"] }, src: { type: "liked_tracks" } })).toThrow(
      "Node graph contains a cycle: loop -> loop"
    );
  });

  it("rejects a cycle that hangs off an acyclic prefix", () => {
    const caught = captureError(() =>
      build({
        start: { type: "limit", input: "x", max_size: 3 },
        x: { type: "sort", input: "y", sort_key: "name" },
        y: { type: "combiner", inputs: ["source", "z"] },
        z: { type: "dedup", input: "x" },
        source: { type: "liked_tracks" },
      })
    );
    expect(caught).toBeInstanceOf(CyclicGraphError);
    expect(caught).toMatchObject({ cycle: ["x", "y", "z", "x"] });
  });

  it("rejects two sinks writing the same playlist", () => {
    expect(() =>
      build({
        src: { type: "liked_tracks" },
        one: { type: "output", input: "src", playlist_name: "Mix" },
        two: { type: "output", input: "src", playlist_name: "Mix" },
      })
    ).toThrow('Node <two>: playlist_name: playlist "Mix" is already written by node <one>');
  });

  it("freezes node specs", () => {
    const graph = build({ src: { type: "liked_tracks" } });
    expect(Object.isFrozen(graph.nodes.get("src"))).toBe(true);
    expect(Object.isFrozen(graph.order)).toBe(true);
  });
});

describe("compileNodeGraph", () => {
  it("expands templates before building", () => {
    const graph = compileNodeGraph({
      liked: { type: "liked_tracks" },
      genres: {
        type: "dynamic_template",
        template: {
          "{g} Output": { type: "output", input: "{g} Limited", playlist_name: "{g} Output" },
          "{g} Limited": { type: "limit", input: "liked", max_size: "{n}" },
        },
        instances: [
          { g: "Rock", n: 10 },
          { g: "Pop", n: 20 },
        ],
      },
    });

    expect(graph.order).toEqual(["liked", "Rock Limited", "Rock Output", "Pop Limited", "Pop Output"]);
    expect(graph.nodes.get("Pop Limited")?.params).toEqual({ maxSize: 20 });
  });
});
