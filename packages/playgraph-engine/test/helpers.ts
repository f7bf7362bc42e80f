import type { Track } from "@playgraph/engine";

/** Track whose name defaults to its id. */
export function track(id: string, overrides: Partial<Omit<Track, "id">> = {}): Track {
  return { id, name: id, artist: `artist-${id}`, album: `album-${id}`, ...overrides };
}

export function ids(tracks: readonly Track[]): string[] {
  return tracks.map((entry) => entry.id);
}

export const NO_WAIT = async (): Promise<void> => undefined;
