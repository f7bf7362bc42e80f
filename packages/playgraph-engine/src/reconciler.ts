import { runConcurrent } from "@playgraph/common";
import { ReconciliationError, describeError } from "./errors.js";
import type { SinkNodeSpec } from "./registry.js";
import { callProvider, withRetries, type RunContext } from "./run-context.js";
import { GENERATED_PLAYLIST_DESCRIPTION, type PlaylistHandle, type TrackSet } from "./types.js";

export interface EditPlan {
  /** Ids whose every remote occurrence is removed */
  readonly removals: readonly string[];
  /** Ids appended after the removals, in target order */
  readonly additions: readonly string[];
  /** Remote sequence once both edits are applied */
  readonly result: readonly string[];
}

export interface TrackMove {
  readonly from: number;
  readonly to: number;
}

export interface ReconcileCounts {
  addedCount: number;
  removedCount: number;
  movedCount: number;
}

export type OutputResult =
  | ({ status: "success" } & ReconcileCounts)
  | ({ status: "failed"; error: unknown } & ReconcileCounts);

export interface ReconcileTarget {
  readonly spec: SinkNodeSpec;
  readonly tracks: TrackSet;
}

function countIds(ids: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const id of ids) {
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
}

/**
 * Plans the edit by id multiset. An id that appears remotely more often than
 * in the target is removed entirely (removal drops every occurrence) and its
 * wanted occurrences are added back; surviving remote entries are never
 * touched.
 */
export function planEdits(remote: readonly string[], target: readonly string[]): EditPlan {
  const wanted = countIds(target);
  const present = countIds(remote);

  const removals = [...present.keys()].filter((id) => (present.get(id) ?? 0) > (wanted.get(id) ?? 0));
  const removed = new Set(removals);
  const kept = remote.filter((id) => !removed.has(id));

  const available = countIds(kept);
  const additions: string[] = [];
  for (const id of target) {
    const remaining = available.get(id) ?? 0;
    if (remaining > 0) {
      available.set(id, remaining - 1);
    } else {
      additions.push(id);
    }
  }

  return { removals, additions, result: [...kept, ...additions] };
}

/**
 * Single moves that turn `current` into `target` (same multiset): at the first
 * mismatched position, the wanted id is pulled forward from later in the list.
 */
export function planMoves(current: readonly string[], target: readonly string[]): TrackMove[] {
  const working = [...current];
  const moves: TrackMove[] = [];
  for (let index = 0; index < target.length; index += 1) {
    if (working[index] === target[index]) {
      continue;
    }
    const from = working.indexOf(target[index], index + 1);
    if (from < 0) {
      throw new ReconciliationError(`Track ${target[index]} is missing from the playlist and cannot be moved into place`);
    }
    const [moved] = working.splice(from, 1);
    working.splice(index, 0, moved);
    moves.push({ from, to: index });
  }
  return moves;
}

function sameSequence(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((id, index) => id === right[index]);
}

async function verify(
  context: RunContext,
  handle: PlaylistHandle,
  expected: readonly string[],
  step: string
): Promise<void> {
  const actual = await callProvider(context, `getPlaylistTrackIds(${handle.name})`, (provider) =>
    provider.getPlaylistTrackIds(handle)
  );
  if (!sameSequence(actual, expected)) {
    throw new ReconciliationError(
      `Playlist "${handle.name}" does not match after ${step}: expected ${expected.length} track(s), found ${actual.length}`
    );
  }
}

/** One full read-plan-write pass; counts are accumulated into `counts`. */
async function reconcileOnce(context: RunContext, target: ReconcileTarget, counts: ReconcileCounts): Promise<void> {
  const { playlistName } = target.spec.params;
  const targetIds = target.tracks.map((track) => track.id);
  const incremental = context.verifyMode === "incremental";

  const handle = await callProvider(context, `findOrCreatePlaylist(${playlistName})`, (provider) =>
    provider.findOrCreatePlaylist(playlistName, {
      public: target.spec.params.public,
      description: GENERATED_PLAYLIST_DESCRIPTION,
    })
  );
  const remote = await callProvider(context, `getPlaylistTrackIds(${playlistName})`, (provider) =>
    provider.getPlaylistTrackIds(handle)
  );
  const plan = planEdits(remote, targetIds);

  if (plan.removals.length > 0) {
    const removed = new Set(plan.removals);
    const afterRemoval = remote.filter((id) => !removed.has(id));
    await callProvider(context, `removeTracks(${playlistName})`, (provider) => provider.removeTracks(handle, plan.removals));
    counts.removedCount += remote.length - afterRemoval.length;
    if (incremental) {
      await verify(context, handle, afterRemoval, "removing tracks");
    }
  }

  if (plan.additions.length > 0) {
    await callProvider(context, `addTracks(${playlistName})`, (provider) => provider.addTracks(handle, plan.additions));
    counts.addedCount += plan.additions.length;
    if (incremental) {
      await verify(context, handle, plan.result, "adding tracks");
    }
  }

  let expected = plan.result;
  const { moveTrack } = context.provider;
  if (moveTrack && !sameSequence(plan.result, targetIds)) {
    const working = [...plan.result];
    for (const move of planMoves(plan.result, targetIds)) {
      await callProvider(context, `moveTrack(${playlistName}, ${move.from} -> ${move.to})`, (provider) =>
        moveTrack.call(provider, handle, move.from, move.to)
      );
      counts.movedCount += 1;
      const [moved] = working.splice(move.from, 1);
      working.splice(move.to, 0, moved);
      if (incremental) {
        await verify(context, handle, working, "moving a track");
      }
    }
    expected = targetIds;
  }

  if (context.verifyMode === "end") {
    await verify(context, handle, expected, "reconciliation");
  }
}

/**
 * Brings one remote playlist in line with its computed tracks. Holds the
 * playlist's lock for the whole attempt sequence; every retry re-reads the
 * remote list first, so repeated adds and removes never pile up.
 */
export async function reconcileOutput(context: RunContext, target: ReconcileTarget): Promise<OutputResult> {
  const { playlistName } = target.spec.params;
  const counts: ReconcileCounts = { addedCount: 0, removedCount: 0, movedCount: 0 };

  try {
    await context.playlistLock.runExclusive(playlistName, () =>
      withRetries(context, `reconcile "${playlistName}"`, () => reconcileOnce(context, target, counts))
    );
    context.logger.info(
      `Playlist "${playlistName}": +${counts.addedCount} -${counts.removedCount} moved ${counts.movedCount}`
    );
    return { status: "success", ...counts };
  } catch (error) {
    context.logger.error(`Playlist "${playlistName}" failed: ${describeError(error)}`);
    return { status: "failed", error, ...counts };
  }
}

/** Reconciles distinct playlists in parallel, up to the context's concurrency. */
export async function reconcileOutputs(
  context: RunContext,
  targets: readonly ReconcileTarget[]
): Promise<Map<string, OutputResult>> {
  const results = new Map<string, OutputResult>();
  await runConcurrent(targets, context.concurrency, async (target) => {
    results.set(target.spec.name, await reconcileOutput(context, target));
  });
  return results;
}
