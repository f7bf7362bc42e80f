import { EvaluationError, PlaygraphError, describeError } from "./errors.js";
import type { DependencyGraph } from "./graph.js";
import { isSourceNode, type NodeSpec, type SourceNodeSpec, type TransformNodeSpec } from "./registry.js";
import { callProvider, withRetries, type RunContext } from "./run-context.js";
import { runTransform, type TransformEnvironment } from "./transforms.js";
import type { Track, TrackSet } from "./types.js";

export type NodeOutcome =
  | { status: "success"; tracks: TrackSet }
  | { status: "failed"; error: unknown }
  | { status: "skipped"; failedAncestor: string; error: unknown };

/**
 * Node name to computed track set. Each key is written once; the stored sets
 * are frozen so that no consumer can change what another node reads.
 */
export class EvaluationContext {
  private readonly results = new Map<string, TrackSet>();

  /** Stores a frozen copy and returns it. */
  set(name: string, tracks: TrackSet): TrackSet {
    if (this.results.has(name)) {
      throw new PlaygraphError(`Evaluation result for node <${name}> was written twice`);
    }
    const stored = Object.freeze([...tracks]);
    this.results.set(name, stored);
    return stored;
  }

  get(name: string): TrackSet | undefined {
    return this.results.get(name);
  }

  has(name: string): boolean {
    return this.results.has(name);
  }

  /** Names in the order their results were written */
  names(): string[] {
    return [...this.results.keys()];
  }
}

export interface EvaluationResult {
  readonly context: EvaluationContext;
  readonly outcomes: ReadonlyMap<string, NodeOutcome>;
}

function sourceKey(spec: SourceNodeSpec): string {
  switch (spec.kind) {
    case "playlist":
      return `playlist:${spec.params.uri}`;
    case "liked_tracks":
      return "liked";
    case "all_tracks":
      return "library";
  }
}

function fetchSource(context: RunContext, spec: SourceNodeSpec): Promise<Track[]> {
  switch (spec.kind) {
    case "playlist": {
      const { uri } = spec.params;
      return callProvider(context, `fetchPlaylistTracks(${uri})`, (provider) => provider.fetchPlaylistTracks(uri));
    }
    case "liked_tracks":
      return callProvider(context, "fetchLikedTracks()", (provider) => provider.fetchLikedTracks());
    case "all_tracks":
      return callProvider(context, "fetchAllLibraryTracks()", (provider) => provider.fetchAllLibraryTracks());
  }
}

/** At most one fetch per source key per run; concurrent readers share it. */
export function loadSource(context: RunContext, spec: SourceNodeSpec): Promise<TrackSet> {
  const key = sourceKey(spec);
  const cached = context.sourceCache.get(key);
  if (cached) {
    return cached;
  }
  const pending = context.limit(() => withRetries(context, key, () => fetchSource(context, spec))).then(
    (tracks): TrackSet => Object.freeze(tracks)
  );
  context.sourceCache.set(key, pending);
  return pending;
}

async function loadLikedIds(context: RunContext): Promise<ReadonlySet<string>> {
  const liked = await loadSource(context, { name: "liked", kind: "liked_tracks", inputs: [], params: {}, index: -1 });
  return new Set(liked.map((track) => track.id));
}

async function buildEnvironment(context: RunContext, spec: TransformNodeSpec, inputs: readonly TrackSet[]): Promise<TransformEnvironment> {
  const now = context.now();
  const needsLikedIds = spec.kind === "is_liked" && inputs.some((tracks) => tracks.some((track) => track.liked === undefined));
  if (!needsLikedIds) {
    return { now };
  }
  return { now, likedIds: await loadLikedIds(context) };
}

async function computeNode(context: RunContext, spec: NodeSpec, inputs: readonly TrackSet[]): Promise<TrackSet> {
  if (isSourceNode(spec)) {
    return await loadSource(context, spec);
  }
  const environment = await buildEnvironment(context, spec, inputs);
  try {
    return runTransform(spec.kind, inputs, spec.params, environment);
  } catch (error) {
    if (error instanceof PlaygraphError) {
      throw error;
    }
    throw new EvaluationError(spec.name, describeError(error), { cause: error });
  }
}

/**
 * Evaluates every node of the graph. Each node waits on its inputs' promises,
 * so independent subgraphs proceed concurrently; remote fetches share the
 * context's concurrency limit. A failing node marks its descendants skipped
 * and leaves the rest of the graph running.
 */
export async function evaluateGraph(graph: DependencyGraph, context: RunContext): Promise<EvaluationResult> {
  const results = new EvaluationContext();
  const pending = new Map<string, Promise<NodeOutcome>>();

  const evaluateNode = async (spec: NodeSpec): Promise<NodeOutcome> => {
    const inputs: TrackSet[] = [];
    for (const inputName of spec.inputs) {
      const dependency = pending.get(inputName);
      if (!dependency) {
        throw new PlaygraphError(`Node <${inputName}> was not scheduled before <${spec.name}>`);
      }
      const outcome = await dependency;
      if (outcome.status === "failed") {
        return { status: "skipped", failedAncestor: inputName, error: outcome.error };
      }
      if (outcome.status === "skipped") {
        return outcome;
      }
      const stored = results.get(inputName);
      if (!stored) {
        throw new PlaygraphError(`Node <${inputName}> succeeded without storing a result`);
      }
      inputs.push(stored);
    }

    try {
      const tracks = results.set(spec.name, await computeNode(context, spec, inputs));
      context.logger.debug(`Node <${spec.name}> produced ${tracks.length} track(s)`);
      return { status: "success", tracks };
    } catch (error) {
      context.logger.warn(`Node <${spec.name}> failed: ${describeError(error)}`);
      return { status: "failed", error };
    }
  };

  for (const name of graph.order) {
    const spec = graph.nodes.get(name);
    if (spec) {
      pending.set(name, evaluateNode(spec));
    }
  }

  const outcomes = new Map<string, NodeOutcome>();
  for (const [name, outcome] of pending) {
    outcomes.set(name, await outcome);
  }
  return { context: results, outcomes };
}
