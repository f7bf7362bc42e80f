import { PermanentProviderError } from "./errors.js";
import type { PlaylistCreateOptions, PlaylistHandle, PlaylistProvider, Track } from "./types.js";

export type ProviderMethod =
  | "fetchPlaylistTracks"
  | "fetchLikedTracks"
  | "fetchAllLibraryTracks"
  | "findOrCreatePlaylist"
  | "getPlaylistTrackIds"
  | "addTracks"
  | "removeTracks"
  | "moveTrack";

export interface InMemoryProviderOptions {
  /** Source playlists by URI */
  playlists?: Record<string, Track[]>;
  liked?: Track[];
  /** Without it the provider offers no moveTrack */
  supportsMove?: boolean;
}

interface StoredPlaylist {
  handle: PlaylistHandle;
  ids: string[];
  options: PlaylistCreateOptions;
}

/**
 * Provider backed by plain maps. Used for dry runs and tests: it records every
 * call and can be told to fail a method a number of times.
 */
export class InMemoryPlaylistProvider implements PlaylistProvider {
  readonly calls: ProviderMethod[] = [];
  readonly moveTrack?: (handle: PlaylistHandle, from: number, to: number) => Promise<void>;

  private readonly sources: Map<string, Track[]>;
  private readonly liked: Track[];
  private readonly written = new Map<string, StoredPlaylist>();
  private readonly failures = new Map<ProviderMethod, Error[]>();
  private nextId = 1;

  constructor(options: InMemoryProviderOptions = {}) {
    this.sources = new Map(Object.entries(options.playlists ?? {}));
    this.liked = options.liked ?? [];
    if (options.supportsMove ?? true) {
      this.moveTrack = async (handle, from, to) => {
        this.record("moveTrack");
        const ids = this.stored(handle).ids;
        if (from < 0 || from >= ids.length || to < 0 || to >= ids.length) {
          throw new PermanentProviderError(`Move ${from} -> ${to} is out of range for "${handle.name}"`);
        }
        const [moved] = ids.splice(from, 1);
        ids.splice(to, 0, moved);
      };
    }
  }

  /** The next `times` calls of `method` throw `error`. */
  failNext(method: ProviderMethod, error: Error, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i += 1) {
      queue.push(error);
    }
    this.failures.set(method, queue);
  }

  /** Seeds a written playlist as if an earlier run had left it behind. */
  seedPlaylist(name: string, ids: readonly string[], options: PlaylistCreateOptions = {}): PlaylistHandle {
    const handle = { id: `memory-${this.nextId}`, name };
    this.nextId += 1;
    this.written.set(name, { handle, ids: [...ids], options });
    return handle;
  }

  playlistIds(name: string): string[] | undefined {
    const playlist = this.written.get(name);
    return playlist ? [...playlist.ids] : undefined;
  }

  playlistOptions(name: string): PlaylistCreateOptions | undefined {
    return this.written.get(name)?.options;
  }

  callCount(method: ProviderMethod): number {
    return this.calls.filter((call) => call === method).length;
  }

  async fetchPlaylistTracks(uri: string): Promise<Track[]> {
    this.record("fetchPlaylistTracks");
    const tracks = this.sources.get(uri);
    if (!tracks) {
      throw new PermanentProviderError(`Playlist ${uri} does not exist`);
    }
    return [...tracks];
  }

  async fetchLikedTracks(): Promise<Track[]> {
    this.record("fetchLikedTracks");
    return this.liked.map((track) => ({ ...track, liked: true }));
  }

  async fetchAllLibraryTracks(): Promise<Track[]> {
    this.record("fetchAllLibraryTracks");
    const likedIds = new Set(this.liked.map((track) => track.id));
    const fromPlaylists = [...this.sources.values()].flat().map((track) => ({ ...track, liked: likedIds.has(track.id) }));
    return [...this.liked.map((track) => ({ ...track, liked: true })), ...fromPlaylists];
  }

  async findOrCreatePlaylist(name: string, options: PlaylistCreateOptions = {}): Promise<PlaylistHandle> {
    this.record("findOrCreatePlaylist");
    return this.written.get(name)?.handle ?? this.seedPlaylist(name, [], options);
  }

  async getPlaylistTrackIds(handle: PlaylistHandle): Promise<string[]> {
    this.record("getPlaylistTrackIds");
    return [...this.stored(handle).ids];
  }

  async addTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void> {
    this.record("addTracks");
    this.stored(handle).ids.push(...ids);
  }

  async removeTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void> {
    this.record("removeTracks");
    const removed = new Set(ids);
    const playlist = this.stored(handle);
    playlist.ids = playlist.ids.filter((id) => !removed.has(id));
  }

  private record(method: ProviderMethod): void {
    this.calls.push(method);
    const failure = this.failures.get(method)?.shift();
    if (failure) {
      throw failure;
    }
  }

  private stored(handle: PlaylistHandle): StoredPlaylist {
    const playlist = this.written.get(handle.name);
    if (!playlist || playlist.handle.id !== handle.id) {
      throw new PermanentProviderError(`Playlist "${handle.name}" (${handle.id}) does not exist`);
    }
    return playlist;
  }
}
