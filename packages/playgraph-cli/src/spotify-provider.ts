/**
 * Spotify Web API client implementing the engine's PlaylistProvider
 * Endpoints: https://developer.spotify.com/documentation/web-api
 */

import process from "node:process";

import { createLogger, type PlaygraphLogger, type SpotifySettings } from "@playgraph/common";
import {
  ConfigurationError,
  GENERATED_PLAYLIST_DESCRIPTION,
  PermanentProviderError,
  TransientProviderError,
  describeError,
  type PlaylistCreateOptions,
  type PlaylistHandle,
  type PlaylistProvider,
  type Track,
} from "@playgraph/engine";
import { z } from "zod";

export const DEFAULT_SPOTIFY_API_BASE_URL = "https://api.spotify.com/v1";
export const ACCESS_TOKEN_ENV = "SPOTIFY_ACCESS_TOKEN";

/** Spotify accepts at most 100 items per playlist mutation. */
export const MUTATION_BATCH_SIZE = 100;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SpotifyProviderOptions {
  accessToken: string;
  apiBaseUrl?: string;
  fetch?: FetchLike;
  logger?: PlaygraphLogger;
}

const trackSchema = z.object({
  id: z.string().nullable(),
  type: z.string().optional(),
  name: z.string(),
  artists: z.array(z.object({ name: z.string() })),
  album: z.object({
    name: z.string(),
    release_date: z.string().nullable().optional(),
  }),
});

const playlistItemSchema = z.object({
  added_at: z.string().nullable().optional(),
  track: trackSchema.nullable(),
});

const savedTrackSchema = z.object({
  added_at: z.string(),
  track: trackSchema,
});

const playlistSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  public: z.boolean().nullable().optional(),
  owner: z.object({ id: z.string() }),
});

const userSchema = z.object({ id: z.string() });

const snapshotSchema = z.object({ snapshot_id: z.string() });

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

const pageSchema = z.object({
  items: z.array(z.unknown()),
  next: z.string().nullable(),
});

type SpotifyTrack = z.infer<typeof trackSchema>;
type SpotifyPlaylist = z.infer<typeof playlistSchema>;
type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

const PLAYLIST_URI = /^spotify:playlist:([A-Za-z0-9]+)$/;
const PLAYLIST_URL = /^https?:\/\/open\.spotify\.com\/playlist\/([A-Za-z0-9]+)/;
const PLAYLIST_ID = /^[A-Za-z0-9]+$/;

/** Accepts `spotify:playlist:<id>`, an open.spotify.com link or a bare id. */
export function parsePlaylistId(uri: string): string {
  const trimmed = uri.trim();
  const match = PLAYLIST_URI.exec(trimmed) ?? PLAYLIST_URL.exec(trimmed);
  if (match) {
    return match[1];
  }
  if (PLAYLIST_ID.test(trimmed)) {
    return trimmed;
  }
  throw new PermanentProviderError(`"${uri}" is not a Spotify playlist URI`);
}

/** Seconds or an HTTP date; undefined when absent or unreadable. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === "") {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

function toTrackUri(id: string): string {
  return `spotify:track:${id}`;
}

function parseAddedAt(value: string | null | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? undefined : new Date(timestamp);
}

/** Local files and podcast episodes have no catalogue id and are skipped. */
function toTrack(raw: SpotifyTrack | null, addedAt: string | null | undefined, liked?: boolean): Track | undefined {
  if (!raw || raw.id === null || (raw.type !== undefined && raw.type !== "track")) {
    return undefined;
  }
  return {
    id: raw.id,
    name: raw.name,
    artist: raw.artists[0]?.name ?? "",
    album: raw.album.name,
    addedAt: parseAddedAt(addedAt),
    releaseDate: raw.album.release_date ?? undefined,
    liked,
  };
}

function isGenerated(playlist: SpotifyPlaylist): boolean {
  return (playlist.description ?? "").includes(GENERATED_PLAYLIST_DESCRIPTION);
}

export class SpotifyPlaylistProvider implements PlaylistProvider {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: PlaygraphLogger;
  private userId?: Promise<string>;
  /** Last known item layout per playlist id, kept current by our own writes */
  private readonly layouts = new Map<string, Array<string | null>>();

  constructor(private readonly options: SpotifyProviderOptions) {
    this.baseUrl = (options.apiBaseUrl ?? DEFAULT_SPOTIFY_API_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger("spotify");
  }

  async fetchPlaylistTracks(uri: string): Promise<Track[]> {
    const id = parsePlaylistId(uri);
    const items = await this.paginate(`/playlists/${id}/tracks?limit=100`, playlistItemSchema);
    return items.flatMap((item) => toTrack(item.track, item.added_at) ?? []);
  }

  async fetchLikedTracks(): Promise<Track[]> {
    const items = await this.paginate("/me/tracks?limit=50", savedTrackSchema);
    return items.flatMap((item) => toTrack(item.track, item.added_at, true) ?? []);
  }

  /** Liked tracks followed by the tracks of every playlist not written by playgraph. */
  async fetchAllLibraryTracks(): Promise<Track[]> {
    const liked = await this.fetchLikedTracks();
    const likedIds = new Set(liked.map((track) => track.id));
    const tracks = [...liked];
    for (const playlist of await this.listPlaylists()) {
      if (isGenerated(playlist)) {
        continue;
      }
      const playlistTracks = await this.fetchPlaylistTracks(playlist.id);
      tracks.push(...playlistTracks.map((track) => ({ ...track, liked: likedIds.has(track.id) })));
    }
    return tracks;
  }

  /**
   * Finds the user's playlist with this exact name or creates it. An existing
   * playlist gets its visibility and description brought in line. More than
   * one match is refused.
   */
  async findOrCreatePlaylist(name: string, options: PlaylistCreateOptions = {}): Promise<PlaylistHandle> {
    const userId = await this.currentUserId();
    const isPublic = options.public ?? false;
    const description = options.description ?? GENERATED_PLAYLIST_DESCRIPTION;
    const matches = (await this.listPlaylists()).filter(
      (playlist) => playlist.owner.id === userId && playlist.name === name
    );

    if (matches.length > 1) {
      throw new PermanentProviderError(
        `Found ${matches.length} playlists named "${name}"; refusing to update any of them`
      );
    }

    const [existing] = matches;
    if (existing) {
      if ((existing.public ?? false) !== isPublic || existing.description !== description) {
        await this.send("PUT", `/playlists/${existing.id}`, { public: isPublic, description });
      }
      return { id: existing.id, name: existing.name };
    }

    this.logger.info(`Creating playlist "${name}"`);
    const created = await this.request("POST", `/users/${encodeURIComponent(userId)}/playlists`, playlistSchema, {
      name,
      public: isPublic,
      description,
    });
    return { id: created.id, name: created.name };
  }

  /** Catalogue ids only; local files and removed tracks are left out. */
  async getPlaylistTrackIds(handle: PlaylistHandle): Promise<string[]> {
    const layout = await this.readLayout(handle);
    return layout.flatMap((id) => id ?? []);
  }

  async addTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void> {
    for (const batch of chunk(ids, MUTATION_BATCH_SIZE)) {
      await this.request("POST", `/playlists/${handle.id}/tracks`, snapshotSchema, { uris: batch.map(toTrackUri) });
      this.layouts.get(handle.id)?.push(...batch);
    }
  }

  async removeTracks(handle: PlaylistHandle, ids: readonly string[]): Promise<void> {
    for (const batch of chunk(ids, MUTATION_BATCH_SIZE)) {
      await this.request("DELETE", `/playlists/${handle.id}/tracks`, snapshotSchema, {
        tracks: batch.map((id) => ({ uri: toTrackUri(id) })),
      });
      const layout = this.layouts.get(handle.id);
      if (layout) {
        const removed = new Set(batch);
        this.layouts.set(
          handle.id,
          layout.filter((id) => id === null || !removed.has(id))
        );
      }
    }
  }

  /**
   * `from` and `to` index the catalogue tracks as returned by
   * getPlaylistTrackIds. Spotify indexes every item, local files included,
   * so both are mapped onto raw positions first.
   */
  async moveTrack(handle: PlaylistHandle, from: number, to: number): Promise<void> {
    const layout = this.layouts.get(handle.id) ?? (await this.readLayout(handle));
    const positions = layout.flatMap((id, index) => (id === null ? [] : [index]));
    const rangeStart = positions[from];
    if (rangeStart === undefined || to < 0 || to >= positions.length) {
      throw new PermanentProviderError(
        `Cannot move track ${from} to ${to} in playlist "${handle.name}" of ${positions.length} track(s)`
      );
    }
    // insert_before indexes the list as it was before the move
    const insertBefore = (to < from ? positions[to] : positions[to + 1]) ?? layout.length;
    await this.request("PUT", `/playlists/${handle.id}/tracks`, snapshotSchema, {
      range_start: rangeStart,
      insert_before: insertBefore,
    });
    const [moved] = layout.splice(rangeStart, 1);
    layout.splice(insertBefore > rangeStart ? insertBefore - 1 : insertBefore, 0, moved);
    this.layouts.set(handle.id, layout);
  }

  /** Every item of the playlist in order, null where it has no catalogue id. */
  private async readLayout(handle: PlaylistHandle): Promise<Array<string | null>> {
    const items = await this.paginate(`/playlists/${handle.id}/tracks?limit=100`, playlistItemSchema);
    const layout = items.map((item) => toTrack(item.track, item.added_at)?.id ?? null);
    this.layouts.set(handle.id, layout);
    return layout;
  }

  private currentUserId(): Promise<string> {
    if (!this.userId) {
      this.userId = this.request("GET", "/me", userSchema).then((user) => user.id);
      // a failed lookup is retried on the next call
      this.userId.catch(() => {
        this.userId = undefined;
      });
    }
    return this.userId;
  }

  private async listPlaylists(): Promise<SpotifyPlaylist[]> {
    return await this.paginate("/me/playlists?limit=50", playlistSchema);
  }

  private async paginate<T>(firstPath: string, item: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const items: T[] = [];
    let next: string | null = firstPath;
    while (next !== null) {
      const label = `GET ${next}`;
      const page: z.infer<typeof pageSchema> = await this.request("GET", next, pageSchema);
      items.push(...page.items.map((entry) => validate(item, entry, label)));
      next = page.next;
    }
    return items;
  }

  private async request<T>(
    method: HttpMethod,
    target: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const response = await this.send(method, target, body);
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new PermanentProviderError(`${method} ${target} returned a body that is not JSON`, { cause: error });
    }
    return validate(schema, data, `${method} ${target}`);
  }

  /** Performs the call and maps failure statuses onto provider errors. */
  private async send(method: HttpMethod, target: string, body?: unknown): Promise<Response> {
    const url = /^https?:\/\//.test(target) ? target : `${this.baseUrl}${target}`;
    const label = `${method} ${url}`;
    this.logger.debug(label);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.accessToken}`,
          ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      throw new TransientProviderError(`${label} failed: ${describeError(error)}`, { cause: error });
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientProviderError(`${label} returned HTTP ${response.status}`, {
        retryAfterMs: parseRetryAfter(response.headers.get("Retry-After")),
      });
    }
    if (!response.ok) {
      throw new PermanentProviderError(`${label} returned HTTP ${response.status}${await readErrorMessage(response)}`);
    }
    return response;
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PermanentProviderError(
      `${label} returned an unexpected body at "${issue.path.join(".")}": ${issue.message}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const parsed = errorBodySchema.safeParse(await response.json());
    return parsed.success ? `: ${parsed.data.error.message}` : "";
  } catch {
    return "";
  }
}

/** Builds the provider from the `spotify` config section and `SPOTIFY_ACCESS_TOKEN`. */
export function createSpotifyProvider(
  settings: SpotifySettings | undefined,
  env: NodeJS.ProcessEnv = process.env,
  logger?: PlaygraphLogger
): SpotifyPlaylistProvider {
  const accessToken = env[ACCESS_TOKEN_ENV]?.trim();
  if (!accessToken) {
    throw new ConfigurationError(`${ACCESS_TOKEN_ENV} must be set to a Spotify access token`);
  }
  return new SpotifyPlaylistProvider({ accessToken, apiBaseUrl: settings?.apiBaseUrl, logger });
}
