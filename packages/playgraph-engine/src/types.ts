export interface Track {
  readonly id: string;
  readonly name: string;
  /** Primary artist */
  readonly artist: string;
  readonly album: string;
  /** When the track was saved or added to the playlist it came from */
  readonly addedAt?: Date;
  /** "YYYY", "YYYY-MM" or "YYYY-MM-DD" */
  readonly releaseDate?: string;
  /** Undefined when the source does not know */
  readonly liked?: boolean;
}

export type TrackSet = readonly Track[];

/** One node definition as it appears in parsed configuration. */
export type RawNodeDefinition = Record<string, unknown>;

/**
 * Node name to definition. A Map keeps definition order for every name; a
 * plain object lists integer-like names first, as property order does.
 */
export type RawNodeMapping = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

export interface PlaylistHandle {
  readonly id: string;
  readonly name: string;
}

export interface PlaylistCreateOptions {
  public?: boolean;
  description?: string;
}

/**
 * Remote library the engine reads from and writes to. Implementations throw
 * TransientProviderError for failures worth retrying and
 * PermanentProviderError for everything else.
 */
export interface PlaylistProvider {
  /** Complete track list of a playlist, paginated internally */
  fetchPlaylistTracks(uri: string): Promise<Track[]>;
  fetchLikedTracks(): Promise<Track[]>;
  fetchAllLibraryTracks(): Promise<Track[]>;
  findOrCreatePlaylist(name: string, options?: PlaylistCreateOptions): Promise<PlaylistHandle>;
  getPlaylistTrackIds(handle: PlaylistHandle): Promise<string[]>;
  /** Appends in the given order */
  addTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void>;
  /** Removes every occurrence of each id */
  removeTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void>;
  /**
   * Moves the track at `from` so that it ends up at index `to`. Both index the
   * list getPlaylistTrackIds returns.
   */
  moveTrack?(handle: PlaylistHandle, from: number, to: number): Promise<void>;
}

/** Marker placed in the description of every playlist the engine writes. */
export const GENERATED_PLAYLIST_DESCRIPTION = "Generated by playgraph. Manual edits will be overwritten.";
