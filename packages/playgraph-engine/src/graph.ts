import type { ZodIssue } from "zod";
import { CyclicGraphError, InvalidNodeError, UnknownReferenceError } from "./errors.js";
import {
  NODE_TYPES,
  TEMPLATE_NODE_TYPE,
  isNodeKind,
  isSinkNode,
  type NodeKind,
  type NodeParamsMap,
  type NodeSpec,
  type NodeSpecOf,
  type NodeTypeDefinition,
  type SinkNodeSpec,
} from "./registry.js";
import { expandNodeMapping, type ExpandedNodeMapping } from "./template.js";
import type { RawNodeDefinition, RawNodeMapping } from "./types.js";

export interface DependencyGraph {
  readonly nodes: ReadonlyMap<string, NodeSpec>;
  /** Every node after all of its inputs; ties keep definition order */
  readonly order: readonly string[];
  /** Node name to the names of the nodes that consume it */
  readonly dependents: ReadonlyMap<string, readonly string[]>;
  readonly outputs: readonly SinkNodeSpec[];
}

const INPUT_FIELDS = new Set(["type", "input", "inputs"]);

function describeIssue(name: string, issue: ZodIssue, params: Record<string, unknown>): InvalidNodeError {
  if (issue.code === "unrecognized_keys") {
    return new InvalidNodeError(name, "unknown parameter", issue.keys.join(", "));
  }
  const field = issue.path.map(String).join(".");
  if (issue.code !== "custom" && issue.path.length === 1 && params[field] === undefined) {
    return new InvalidNodeError(name, "required parameter is missing", field);
  }
  return new InvalidNodeError(name, issue.message, field || undefined);
}

function readInputs(name: string, definition: RawNodeDefinition): string[] {
  const { input, inputs } = definition;
  if (input !== undefined && inputs !== undefined) {
    throw new InvalidNodeError(name, "declare either input or inputs, not both", "inputs");
  }
  if (input !== undefined) {
    if (typeof input !== "string" || input.length === 0) {
      throw new InvalidNodeError(name, "must be a node name", "input");
    }
    return [input];
  }
  if (inputs === undefined) {
    return [];
  }
  if (typeof inputs === "string" && inputs.length > 0) {
    return [inputs];
  }
  if (!Array.isArray(inputs) || !inputs.every((entry): entry is string => typeof entry === "string" && entry.length > 0)) {
    throw new InvalidNodeError(name, "must be a list of node names", "inputs");
  }
  return inputs;
}

function createSpec<K extends NodeKind>(
  name: string,
  kind: K,
  definition: RawNodeDefinition,
  index: number
): NodeSpecOf<K> {
  const nodeType: NodeTypeDefinition<NodeParamsMap[K]> = NODE_TYPES[kind];
  const inputs = readInputs(name, definition);

  if (nodeType.arity === "none" && inputs.length > 0) {
    throw new InvalidNodeError(name, `${kind} nodes take no inputs`, "inputs");
  }
  if (nodeType.arity === "single" && inputs.length !== 1) {
    throw new InvalidNodeError(name, `${kind} nodes take exactly one input`, "input");
  }
  if (nodeType.arity === "multiple" && inputs.length === 0) {
    throw new InvalidNodeError(name, `${kind} nodes need at least one input`, "inputs");
  }

  const rawParams = Object.fromEntries(Object.entries(definition).filter(([key]) => !INPUT_FIELDS.has(key)));
  const parsed = nodeType.schema.safeParse(rawParams);
  if (!parsed.success) {
    throw describeIssue(name, parsed.error.issues[0], rawParams);
  }

  return Object.freeze({ name, kind, inputs: Object.freeze(inputs), params: parsed.data, index });
}

export function parseNode(name: string, definition: RawNodeDefinition, index: number): NodeSpec {
  const type = definition.type;
  if (type === TEMPLATE_NODE_TYPE) {
    throw new InvalidNodeError(name, `${TEMPLATE_NODE_TYPE} nodes must be expanded before the graph is built`, "type");
  }
  if (!isNodeKind(type)) {
    throw new InvalidNodeError(
      name,
      type === undefined ? "node type is missing" : `unknown node type "${String(type)}"`,
      "type"
    );
  }
  return createSpec(name, type, definition, index);
}

/**
 * Three-colour depth-first search over input edges, roots taken in definition
 * order. Returns the first cycle met, closed by repeating its first node.
 */
function findCycle(nodes: ReadonlyMap<string, NodeSpec>): string[] | null {
  const colour = new Map<string, "grey" | "black">();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    colour.set(name, "grey");
    stack.push(name);
    const spec = nodes.get(name);
    for (const input of spec?.inputs ?? []) {
      const state = colour.get(input);
      if (state === "grey") {
        return [...stack.slice(stack.indexOf(input)), input];
      }
      if (state === undefined) {
        const cycle = visit(input);
        if (cycle) {
          return cycle;
        }
      }
    }
    stack.pop();
    colour.set(name, "black");
    return null;
  };

  for (const name of nodes.keys()) {
    if (!colour.has(name)) {
      const cycle = visit(name);
      if (cycle) {
        return cycle;
      }
    }
  }
  return null;
}

function topologicalOrder(nodes: ReadonlyMap<string, NodeSpec>, dependents: ReadonlyMap<string, readonly string[]>): string[] {
  const remaining = new Map<string, number>();
  for (const spec of nodes.values()) {
    remaining.set(spec.name, new Set(spec.inputs).size);
  }

  const byIndex = (a: string, b: string): number => (nodes.get(a)?.index ?? 0) - (nodes.get(b)?.index ?? 0);
  const ready = [...nodes.keys()].filter((name) => remaining.get(name) === 0).sort(byIndex);
  const order: string[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
        ready.sort(byIndex);
      }
    }
  }
  return order;
}

/**
 * Validates an expanded node mapping and turns it into a frozen dependency
 * graph. Throws a ConfigurationError subclass on the first problem found.
 */
export function buildGraph(mapping: ExpandedNodeMapping): DependencyGraph {
  const nodes = new Map<string, NodeSpec>();
  let index = 0;
  for (const [name, definition] of mapping) {
    nodes.set(name, parseNode(name, definition, index));
    index += 1;
  }

  const dependents = new Map<string, string[]>();
  for (const name of nodes.keys()) {
    dependents.set(name, []);
  }
  for (const spec of nodes.values()) {
    for (const input of new Set(spec.inputs)) {
      const consumers = dependents.get(input);
      if (!consumers) {
        throw new UnknownReferenceError(spec.name, input);
      }
      consumers.push(spec.name);
    }
  }

  const cycle = findCycle(nodes);
  if (cycle) {
    throw new CyclicGraphError(cycle);
  }

  const outputs: SinkNodeSpec[] = [];
  const sinkByPlaylist = new Map<string, string>();
  for (const spec of nodes.values()) {
    if (!isSinkNode(spec)) {
      continue;
    }
    const previous = sinkByPlaylist.get(spec.params.playlistName);
    if (previous !== undefined) {
      throw new InvalidNodeError(
        spec.name,
        `playlist "${spec.params.playlistName}" is already written by node <${previous}>`,
        "playlist_name"
      );
    }
    sinkByPlaylist.set(spec.params.playlistName, spec.name);
    outputs.push(spec);
  }

  return Object.freeze({
    nodes,
    order: Object.freeze(topologicalOrder(nodes, dependents)),
    dependents,
    outputs: Object.freeze(outputs),
  });
}

/** Template expansion followed by graph building. */
export function compileNodeGraph(mapping: RawNodeMapping): DependencyGraph {
  return buildGraph(expandNodeMapping(mapping));
}
