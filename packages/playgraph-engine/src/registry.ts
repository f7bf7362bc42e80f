import { z } from "zod";

export const SORT_KEYS = ["time_added", "name", "artist", "album", "release_date"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const COMBINE_TYPES = ["concat", "interleave"] as const;
export type CombineType = (typeof COMBINE_TYPES)[number];

export const DEDUP_KEYS = ["id", "metadata"] as const;
export type DedupKey = (typeof DEDUP_KEYS)[number];

export type NodeRole = "source" | "transform" | "sink";

/** none: no inputs allowed; single: exactly one; multiple: one or more. */
export type NodeArity = "none" | "single" | "multiple";

export type Cutoff =
  | { kind: "relative"; daysAgo: number }
  | { kind: "absolute"; timestamp: number; text: string };

export interface TimeFilterParams {
  cutoff: Cutoff;
  keepBefore: boolean;
}

export interface SortParams {
  sortKey: SortKey;
  sortDesc: boolean;
}

export interface OutputParams {
  playlistName: string;
  public: boolean;
}

export type EmptyParams = Record<string, never>;

export interface NodeParamsMap {
  playlist: { uri: string };
  liked_tracks: EmptyParams;
  all_tracks: EmptyParams;
  is_liked: EmptyParams;
  filter_time_added: TimeFilterParams;
  filter_release_date: TimeFilterParams;
  combiner: { combineType: CombineType };
  sort: SortParams;
  dedup: { dedupBy: DedupKey };
  limit: { maxSize: number };
  output: OutputParams;
  combine_sort_dedup_output: SortParams & OutputParams & { dedupBy: DedupKey };
}

export type NodeKind = keyof NodeParamsMap;

export interface NodeTypeDefinition<P> {
  role: NodeRole;
  arity: NodeArity;
  summary: string;
  /** Validates the type-specific fields (everything except type/input/inputs). */
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
}

const emptyParams = z
  .object({})
  .strict()
  .transform((): EmptyParams => ({}));

const nonNegativeInteger = z
  .union([z.number(), z.string().regex(/^\d+$/, "must be a non-negative integer").transform(Number)])
  .pipe(z.number().int().nonnegative());

const nonNegativeNumber = z
  .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative number").transform(Number)])
  .pipe(z.number().nonnegative());

const timeFilterParams = z
  .object({
    days_ago: nonNegativeNumber.optional(),
    cutoff_time: z.string().min(1).optional(),
    keep_before: z.boolean().default(false),
  })
  .strict()
  .transform((value, ctx): TimeFilterParams => {
    const keepBefore = value.keep_before;
    if (value.days_ago !== undefined && value.cutoff_time === undefined) {
      return { cutoff: { kind: "relative", daysAgo: value.days_ago }, keepBefore };
    }
    if (value.cutoff_time !== undefined && value.days_ago === undefined) {
      const timestamp = Date.parse(value.cutoff_time);
      if (Number.isNaN(timestamp)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["cutoff_time"],
          message: `"${value.cutoff_time}" is not an ISO-8601 date or date-time`,
        });
        return z.NEVER;
      }
      return { cutoff: { kind: "absolute", timestamp, text: value.cutoff_time }, keepBefore };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["days_ago"],
      message: "exactly one of days_ago or cutoff_time must be given",
    });
    return z.NEVER;
  });

const sortFields = {
  sort_key: z.enum(SORT_KEYS),
  sort_desc: z.boolean().default(false),
};

type NodeTypeRegistry = { [K in NodeKind]: NodeTypeDefinition<NodeParamsMap[K]> };

export const NODE_TYPES: NodeTypeRegistry = {
  playlist: {
    role: "source",
    arity: "none",
    summary: "All tracks of the playlist at `uri`.",
    schema: z.object({ uri: z.string().min(1) }).strict(),
  },
  liked_tracks: {
    role: "source",
    arity: "none",
    summary: "All liked (saved) tracks.",
    schema: emptyParams,
  },
  all_tracks: {
    role: "source",
    arity: "none",
    summary: "Liked tracks plus the tracks of every playlist in the library.",
    schema: emptyParams,
  },
  is_liked: {
    role: "transform",
    arity: "single",
    summary: "Keeps only liked tracks.",
    schema: emptyParams,
  },
  filter_time_added: {
    role: "transform",
    arity: "single",
    summary: "Keeps tracks added after (or, with keep_before, before) a cutoff.",
    schema: timeFilterParams,
  },
  filter_release_date: {
    role: "transform",
    arity: "single",
    summary: "Keeps tracks released after (or, with keep_before, before) a cutoff.",
    schema: timeFilterParams,
  },
  combiner: {
    role: "transform",
    arity: "multiple",
    summary: "Concatenates or interleaves its inputs.",
    schema: z
      .object({ combine_type: z.enum(COMBINE_TYPES).default("concat") })
      .strict()
      .transform((value) => ({ combineType: value.combine_type })),
  },
  sort: {
    role: "transform",
    arity: "single",
    summary: "Stable sort by sort_key; missing values last.",
    schema: z
      .object(sortFields)
      .strict()
      .transform((value) => ({ sortKey: value.sort_key, sortDesc: value.sort_desc })),
  },
  dedup: {
    role: "transform",
    arity: "single",
    summary: "Drops repeated tracks, keeping the first occurrence.",
    schema: z
      .object({ dedup_by: z.enum(DEDUP_KEYS).default("id") })
      .strict()
      .transform((value) => ({ dedupBy: value.dedup_by })),
  },
  limit: {
    role: "transform",
    arity: "single",
    summary: "Keeps the first max_size tracks.",
    schema: z
      .object({ max_size: nonNegativeInteger })
      .strict()
      .transform((value) => ({ maxSize: value.max_size })),
  },
  output: {
    role: "sink",
    arity: "single",
    summary: "Writes its input to the playlist named playlist_name.",
    schema: z
      .object({ playlist_name: z.string().min(1), public: z.boolean().default(false) })
      .strict()
      .transform((value) => ({ playlistName: value.playlist_name, public: value.public })),
  },
  combine_sort_dedup_output: {
    role: "sink",
    arity: "multiple",
    summary: "combiner(concat), sort, dedup and output in one node.",
    schema: z
      .object({
        output_playlist_name: z.string().min(1),
        ...sortFields,
        dedup_by: z.enum(DEDUP_KEYS).default("id"),
        public: z.boolean().default(false),
      })
      .strict()
      .transform((value) => ({
        playlistName: value.output_playlist_name,
        sortKey: value.sort_key,
        sortDesc: value.sort_desc,
        dedupBy: value.dedup_by,
        public: value.public,
      })),
  },
};

/** Config-only type that the template expander consumes. */
export const TEMPLATE_NODE_TYPE = "dynamic_template";

export function isNodeKind(value: unknown): value is NodeKind {
  return typeof value === "string" && Object.hasOwn(NODE_TYPES, value);
}

export function listNodeTypes(): Array<{ kind: NodeKind; role: NodeRole; arity: NodeArity; summary: string }> {
  return Object.keys(NODE_TYPES)
    .filter(isNodeKind)
    .map((kind) => {
      const { role, arity, summary } = NODE_TYPES[kind];
      return { kind, role, arity, summary };
    });
}

interface NodeSpecBase<K extends NodeKind> {
  readonly name: string;
  readonly kind: K;
  /** Names of the nodes whose output this node consumes, in declared order */
  readonly inputs: readonly string[];
  readonly params: NodeParamsMap[K];
  /** Position in the expanded definition order */
  readonly index: number;
}

export type NodeSpecOf<K extends NodeKind> = { [P in K]: NodeSpecBase<P> }[K];
export type NodeSpec = NodeSpecOf<NodeKind>;

export type SourceKind = "playlist" | "liked_tracks" | "all_tracks";
export type SinkKind = "output" | "combine_sort_dedup_output";
export type TransformKind = Exclude<NodeKind, SourceKind>;

export type SourceNodeSpec = NodeSpecOf<SourceKind>;
export type SinkNodeSpec = NodeSpecOf<SinkKind>;
export type TransformNodeSpec = NodeSpecOf<TransformKind>;

export function isSourceNode(spec: NodeSpec): spec is SourceNodeSpec {
  return NODE_TYPES[spec.kind].role === "source";
}

export function isSinkNode(spec: NodeSpec): spec is SinkNodeSpec {
  return NODE_TYPES[spec.kind].role === "sink";
}
