import { ConfigurationError, describeError } from "./errors.js";
import { evaluateGraph, type NodeOutcome } from "./evaluator.js";
import { buildGraph, type DependencyGraph } from "./graph.js";
import { reconcileOutputs, type OutputResult, type ReconcileTarget } from "./reconciler.js";
import { createRunContext, type RunContext, type RunContextOptions } from "./run-context.js";
import { expandNodeMapping } from "./template.js";
import type { RawNodeMapping, TrackSet } from "./types.js";

export type RunState = "pending" | "expanding" | "building" | "evaluating" | "reconciling" | "done" | "failed";

const NEXT_STATE: Record<RunState, readonly RunState[]> = {
  pending: ["expanding", "failed"],
  expanding: ["building", "failed"],
  building: ["evaluating", "failed"],
  evaluating: ["reconciling", "failed"],
  reconciling: ["done", "failed"],
  done: [],
  failed: [],
};

/** `planned`: evaluated in a dry run, nothing written. */
export type OutputStatus = "success" | "failed" | "planned";

export interface OutputReport {
  status: OutputStatus;
  playlistName: string;
  addedCount: number;
  removedCount: number;
  movedCount: number;
  trackCount: number;
  error?: string;
}

export interface RunReport {
  state: RunState;
  outputs: Record<string, OutputReport>;
  apiCalls: number;
}

export interface PlaylistRunOptions extends RunContextOptions {
  /** Evaluate only; no playlist is created or changed */
  dryRun?: boolean;
  onStateChange?: (state: RunState, previous: RunState) => void;
}

export interface RunResult {
  report: RunReport;
  /** Computed tracks of every successfully evaluated output, by node name */
  tracks: ReadonlyMap<string, TrackSet>;
}

function describeOutcome(outcome: NodeOutcome | undefined): string {
  if (!outcome) {
    return "output was not evaluated";
  }
  if (outcome.status === "skipped") {
    return `skipped because node <${outcome.failedAncestor}> failed: ${describeError(outcome.error)}`;
  }
  return outcome.status === "failed" ? describeError(outcome.error) : "";
}

function toReport(playlistName: string, trackCount: number, result: OutputResult): OutputReport {
  const { status, addedCount, removedCount, movedCount } = result;
  const report: OutputReport = { status, playlistName, addedCount, removedCount, movedCount, trackCount };
  if (result.status === "failed") {
    report.error = describeError(result.error);
  }
  return report;
}

/**
 * A single pass over one node mapping: expand templates, build the graph,
 * evaluate it and reconcile every output. Configuration problems reject the
 * run before any remote call; failures inside the pass are reported per
 * output.
 */
export class PlaylistRun {
  private currentState: RunState = "pending";
  private started = false;
  private readonly context: RunContext;

  constructor(
    private readonly mapping: RawNodeMapping,
    private readonly options: PlaylistRunOptions
  ) {
    this.context = createRunContext(options);
  }

  get state(): RunState {
    return this.currentState;
  }

  private transition(next: RunState): void {
    const previous = this.currentState;
    if (!NEXT_STATE[previous].includes(next)) {
      throw new Error(`Invalid run state transition ${previous} -> ${next}`);
    }
    this.currentState = next;
    this.context.logger.debug(`Run state ${previous} -> ${next}`);
    this.options.onStateChange?.(next, previous);
  }

  async execute(): Promise<RunResult> {
    if (this.started) {
      throw new Error("A run can only be executed once");
    }
    this.started = true;
    try {
      return await this.executeStages();
    } catch (error) {
      if (this.currentState !== "failed") {
        this.transition("failed");
      }
      throw error;
    }
  }

  private async executeStages(): Promise<RunResult> {
    this.transition("expanding");
    const expanded = expandNodeMapping(this.mapping);

    this.transition("building");
    const graph = buildGraph(expanded);
    if (graph.outputs.length === 0) {
      throw new ConfigurationError("Node graph defines no output nodes");
    }

    this.transition("evaluating");
    const { outcomes } = await evaluateGraph(graph, this.context);

    const outputs: Record<string, OutputReport> = {};
    const tracks = new Map<string, TrackSet>();
    const targets: ReconcileTarget[] = [];
    for (const spec of graph.outputs) {
      const outcome = outcomes.get(spec.name);
      if (outcome?.status === "success") {
        tracks.set(spec.name, outcome.tracks);
        targets.push({ spec, tracks: outcome.tracks });
        continue;
      }
      outputs[spec.name] = {
        status: "failed",
        playlistName: spec.params.playlistName,
        addedCount: 0,
        removedCount: 0,
        movedCount: 0,
        trackCount: 0,
        error: describeOutcome(outcome),
      };
    }

    this.transition("reconciling");
    if (this.options.dryRun) {
      for (const target of targets) {
        outputs[target.spec.name] = {
          status: "planned",
          playlistName: target.spec.params.playlistName,
          addedCount: 0,
          removedCount: 0,
          movedCount: 0,
          trackCount: target.tracks.length,
        };
      }
    } else {
      const results = await reconcileOutputs(this.context, targets);
      for (const target of targets) {
        const result = results.get(target.spec.name);
        if (result) {
          outputs[target.spec.name] = toReport(target.spec.params.playlistName, target.tracks.length, result);
        }
      }
    }

    if (this.context.signal?.aborted) {
      this.transition("failed");
    } else {
      this.transition("done");
    }
    return {
      report: { state: this.currentState, outputs: orderOutputs(graph, outputs), apiCalls: this.context.stats.apiCalls },
      tracks,
    };
  }
}

function orderOutputs(graph: DependencyGraph, outputs: Record<string, OutputReport>): Record<string, OutputReport> {
  const ordered: Record<string, OutputReport> = {};
  for (const spec of graph.outputs) {
    const report = outputs[spec.name];
    if (report) {
      ordered[spec.name] = report;
    }
  }
  return ordered;
}

export async function runPlaylistGraph(mapping: RawNodeMapping, options: PlaylistRunOptions): Promise<RunResult> {
  return await new PlaylistRun(mapping, options).execute();
}

export function isRunSuccessful(report: RunReport): boolean {
  return report.state === "done" && Object.values(report.outputs).every((output) => output.status !== "failed");
}
