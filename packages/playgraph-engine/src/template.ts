import { DuplicateNodeError, InvalidNodeError, TemplateExpansionError } from "./errors.js";
import { TEMPLATE_NODE_TYPE } from "./registry.js";
import type { RawNodeDefinition, RawNodeMapping } from "./types.js";

/** Node name to definition, in definition order, with no templates left. */
export type ExpandedNodeMapping = ReadonlyMap<string, RawNodeDefinition>;

export type TemplateSegment = { kind: "text"; text: string } | { kind: "placeholder"; name: string };

type Bindings = Readonly<Record<string, unknown>>;

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Map);
}

/** Entries of a Map or plain-object mapping; undefined for anything else. */
export function mappingEntries(value: unknown): Array<[string, unknown]> | undefined {
  if (value instanceof Map) {
    return [...value].map(([key, child]): [string, unknown] => [String(key), child]);
  }
  return isRecord(value) ? Object.entries(value) : undefined;
}

/**
 * Splits `text` into literal runs and `{identifier}` placeholders. A brace that
 * does not open a well-formed placeholder is kept as literal text.
 */
export function scanTemplate(text: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let literal = "";
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    if (char === "{" && index + 1 < text.length && IDENTIFIER_START.test(text[index + 1])) {
      let end = index + 2;
      while (end < text.length && IDENTIFIER_PART.test(text[end])) {
        end += 1;
      }
      if (text[end] === "}") {
        if (literal) {
          segments.push({ kind: "text", text: literal });
          literal = "";
        }
        segments.push({ kind: "placeholder", name: text.slice(index + 1, end) });
        index = end + 1;
        continue;
      }
    }
    literal += char;
    index += 1;
  }

  if (literal) {
    segments.push({ kind: "text", text: literal });
  }
  return segments;
}

interface SubstitutionScope {
  template: string;
  instanceIndex: number;
  bindings: Bindings;
}

function renderString(text: string, path: string, scope: SubstitutionScope): unknown {
  const segments = scanTemplate(text);
  const lookup = (name: string): unknown => {
    if (!Object.hasOwn(scope.bindings, name)) {
      throw new TemplateExpansionError(scope.template, `unresolved placeholder {${name}}`, {
        instanceIndex: scope.instanceIndex,
        field: path,
      });
    }
    return scope.bindings[name];
  };

  // a lone placeholder keeps the bound value's type
  if (segments.length === 1 && segments[0].kind === "placeholder") {
    return lookup(segments[0].name);
  }

  let rendered = "";
  for (const segment of segments) {
    if (segment.kind === "text") {
      rendered += segment.text;
      continue;
    }
    const value = lookup(segment.name);
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new TemplateExpansionError(
        scope.template,
        `placeholder {${segment.name}} is embedded in text but is bound to a ${value === null ? "null" : typeof value}`,
        { instanceIndex: scope.instanceIndex, field: path }
      );
    }
    rendered += String(value);
  }
  return rendered;
}

function renderKey(key: string, path: string, scope: SubstitutionScope): string {
  const rendered = renderString(key, path, scope);
  if (typeof rendered !== "string") {
    throw new TemplateExpansionError(scope.template, `key "${key}" must render to a string`, {
      instanceIndex: scope.instanceIndex,
      field: path,
    });
  }
  return rendered;
}

function substitute(value: unknown, path: string, scope: SubstitutionScope): unknown {
  if (typeof value === "string") {
    return renderString(value, path, scope);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => substitute(item, `${path}[${index}]`, scope));
  }
  if (isRecord(value)) {
    // fromEntries defines own properties, so a "__proto__" key survives
    return Object.fromEntries(
      Object.entries(value).map(([key, child]) => {
        const childPath = path ? `${path}.${key}` : key;
        return [renderKey(key, childPath, scope), substitute(child, childPath, scope)];
      })
    );
  }
  return value;
}

function expandTemplateNode(name: string, definition: RawNodeDefinition): Array<[string, RawNodeDefinition]> {
  const { instances } = definition;
  const template = mappingEntries(definition.template);
  if (!template) {
    throw new TemplateExpansionError(name, `"template" must be a mapping of node names to definitions`);
  }
  if (!Array.isArray(instances)) {
    throw new TemplateExpansionError(name, `"instances" must be a list of placeholder bindings`);
  }
  const unexpected = Object.keys(definition).filter((key) => !["type", "template", "instances"].includes(key));
  if (unexpected.length > 0) {
    throw new TemplateExpansionError(name, `unexpected field(s): ${unexpected.join(", ")}`);
  }

  for (const [bodyName, body] of template) {
    if (!isRecord(body)) {
      throw new TemplateExpansionError(name, `template node "${bodyName}" must be a mapping`);
    }
    if (body.type === TEMPLATE_NODE_TYPE) {
      throw new TemplateExpansionError(name, `template node "${bodyName}" is itself a ${TEMPLATE_NODE_TYPE}; nested templates are not supported`);
    }
  }

  const expanded: Array<[string, RawNodeDefinition]> = [];
  instances.forEach((bindings: unknown, instanceIndex) => {
    if (!isRecord(bindings)) {
      throw new TemplateExpansionError(name, "instance must be a mapping of placeholder names to values", { instanceIndex });
    }
    const scope: SubstitutionScope = { template: name, instanceIndex, bindings };
    for (const [bodyName, body] of template) {
      const renderedName = renderKey(bodyName, bodyName, scope);
      const renderedBody = substitute(body, bodyName, scope);
      if (!isRecord(renderedBody)) {
        throw new TemplateExpansionError(name, `template node "${bodyName}" must render to a mapping`, { instanceIndex });
      }
      expanded.push([renderedName, renderedBody]);
    }
  });
  return expanded;
}

/**
 * `combine_sort_dedup_output` accepts `input_uris` (playlist URIs) or
 * `input_nodes` (node names). URIs become generated `playlist` nodes named
 * `<node>_in_<index>`; both forms end up as the node's `inputs`.
 */
function desugarCompoundNode(name: string, definition: RawNodeDefinition): Array<[string, RawNodeDefinition]> {
  const { input_uris: inputUris, input_nodes: inputNodes, ...rest } = definition;
  if (rest.input !== undefined || rest.inputs !== undefined) {
    throw new InvalidNodeError(name, "declare inputs with input_nodes or input_uris", "inputs");
  }
  if ((inputUris === undefined) === (inputNodes === undefined)) {
    throw new InvalidNodeError(name, "exactly one of input_nodes or input_uris must be given", "input_nodes");
  }

  if (inputNodes !== undefined) {
    return [[name, { ...rest, inputs: inputNodes }]];
  }

  if (!Array.isArray(inputUris) || inputUris.length === 0 || !inputUris.every((uri): uri is string => typeof uri === "string")) {
    throw new InvalidNodeError(name, "must be a non-empty list of playlist URIs", "input_uris");
  }
  const generated = inputUris.map((uri, index): [string, RawNodeDefinition] => [
    `${name}_in_${index}`,
    { type: "playlist", uri },
  ]);
  return [...generated, [name, { ...rest, inputs: generated.map(([generatedName]) => generatedName) }]];
}

/**
 * Replaces every `dynamic_template` node with one copy of its template per
 * instance, desugars compound nodes, and checks that names stay unique.
 * Nodes that need no rewriting are passed through untouched.
 */
export function expandNodeMapping(mapping: RawNodeMapping): ExpandedNodeMapping {
  const expanded = new Map<string, RawNodeDefinition>();
  const origins = new Map<string, string>();

  const add = (nodeName: string, definition: RawNodeDefinition, origin: string): void => {
    const previous = origins.get(nodeName);
    if (previous !== undefined) {
      throw new DuplicateNodeError(nodeName, `${previous} and ${origin}`);
    }
    origins.set(nodeName, origin);
    expanded.set(nodeName, definition);
  };

  const addConcrete = (nodeName: string, definition: RawNodeDefinition, origin: string): void => {
    if (definition.type === "combine_sort_dedup_output") {
      for (const [generatedName, generated] of desugarCompoundNode(nodeName, definition)) {
        add(generatedName, generated, origin);
      }
      return;
    }
    add(nodeName, definition, origin);
  };

  for (const [name, definition] of mappingEntries(mapping) ?? []) {
    if (!isRecord(definition)) {
      throw new InvalidNodeError(name, "node definition must be a mapping");
    }
    if (definition.type !== TEMPLATE_NODE_TYPE) {
      addConcrete(name, definition, "top-level definition");
      continue;
    }
    for (const [expandedName, expandedDefinition] of expandTemplateNode(name, definition)) {
      addConcrete(expandedName, expandedDefinition, `template <${name}>`);
    }
  }

  return expanded;
}
