import { readFile } from "node:fs/promises";

import { listFilesWithExtensions, pathExists } from "@playgraph/common";
import { ConfigurationError, DuplicateNodeError, describeError } from "@playgraph/engine";
import { isMap, isNode, isScalar, parseDocument as parseYamlDocument, type Document, type YAMLMap } from "yaml";
import { z } from "zod";

export const USER_CONFIG_EXTENSIONS: readonly string[] = [".yaml", ".yml", ".json"];

const userConfigSchema = z
  .object({
    nodes: z.record(z.unknown()),
  })
  .strict();

export interface UserConfigFile {
  path: string;
  /** In the order the file defines them */
  nodes: ReadonlyMap<string, unknown>;
}

/** JSON files go through the YAML parser too, which keeps key order. */
function parseDocument(contents: string, filePath: string): Document {
  const document = parseYamlDocument(contents);
  const [error] = document.errors;
  if (error) {
    throw new ConfigurationError(`Unable to parse node file ${filePath}: ${describeError(error)}`, { cause: error });
  }
  return document;
}

function mapKey(key: unknown): string {
  return String(isScalar(key) ? key.value : key);
}

function toOrderedMap(node: YAMLMap, convert: (value: unknown) => unknown): Map<string, unknown> {
  const entries = new Map<string, unknown>();
  for (const pair of node.items) {
    entries.set(mapKey(pair.key), convert(pair.value));
  }
  return entries;
}

/**
 * Nodes and template bodies become Maps so that integer-like names keep
 * their place; everything else becomes plain JavaScript values.
 */
function orderedNodes(nodes: YAMLMap, document: Document): Map<string, unknown> {
  const toJs = (value: unknown): unknown => (isNode(value) ? value.toJS(document) : value);
  return toOrderedMap(nodes, (definition) => {
    const plain = toJs(definition);
    if (!isMap(definition) || typeof plain !== "object" || plain === null) {
      return plain;
    }
    const template = definition.get("template", true);
    if (!isMap(template)) {
      return plain;
    }
    return { ...plain, template: toOrderedMap(template, toJs) };
  });
}

/** Validates one parsed node file: a single top-level `nodes` mapping. */
export function parseUserConfig(contents: string, filePath: string): UserConfigFile {
  const document = parseDocument(contents, filePath);
  const result = userConfigSchema.safeParse(document.toJS());
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new ConfigurationError(
      `Node file ${filePath} must contain a "nodes" mapping${where}: ${issue.message}`,
      { cause: result.error }
    );
  }
  const nodes = document.get("nodes", true);
  return {
    path: filePath,
    nodes: isMap(nodes) ? orderedNodes(nodes, document) : new Map(Object.entries(result.data.nodes)),
  };
}

export async function loadUserConfigFile(filePath: string): Promise<UserConfigFile> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Unable to read node file ${filePath}`, { cause: error });
  }
  return parseUserConfig(contents, filePath);
}

/** Node files directly inside `dirPath`, sorted by name. */
export async function discoverUserConfigFiles(dirPath: string): Promise<string[]> {
  if (!(await pathExists(dirPath))) {
    throw new ConfigurationError(`Node file directory ${dirPath} does not exist`);
  }
  return await listFilesWithExtensions(dirPath, USER_CONFIG_EXTENSIONS);
}

/**
 * Loads every file and merges their nodes in file order. A node name may
 * appear in only one file.
 */
export async function loadUserConfigs(filePaths: readonly string[]): Promise<Map<string, unknown>> {
  const merged = new Map<string, unknown>();
  const origins = new Map<string, string>();

  for (const filePath of filePaths) {
    const file = await loadUserConfigFile(filePath);
    for (const [name, definition] of file.nodes) {
      const previous = origins.get(name);
      if (previous !== undefined) {
        throw new DuplicateNodeError(name, `${previous} and ${file.path}`);
      }
      origins.set(name, file.path);
      merged.set(name, definition);
    }
  }

  return merged;
}
