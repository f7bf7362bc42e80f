#!/usr/bin/env tsx

import { realpathSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";

import {
  VERIFY_MODES,
  createLogger,
  ensureDir,
  formatHelp,
  handleParseResult,
  loadConfig,
  parseArgs,
  stringifyDeterministic,
  type ArgDef,
  type JsonValue,
  type PlaygraphConfig,
  type PlaygraphLogger,
  type VerifyMode,
} from "@playgraph/common";
import {
  ConfigurationError,
  describeError,
  isRunSuccessful,
  listNodeTypes,
  runPlaylistGraph,
  type OutputReport,
  type PlaylistProvider,
  type RunReport,
} from "@playgraph/engine";

import { createSpotifyProvider } from "./spotify-provider.js";
import { discoverUserConfigFiles, loadUserConfigs } from "./user-config.js";

interface PlaygraphCliOptions {
  config?: string;
  verifyMode?: VerifyMode;
  concurrency?: number;
  dryRun: boolean;
  report?: string;
  listNodeTypes: boolean;
}

const ARG_DEFS: ArgDef[] = [
  {
    name: "--config",
    type: "string",
    description: "Load an alternate .playgraph.json file",
  },
  {
    name: "--verify-mode",
    type: "string",
    description: "When written playlists are read back and compared",
    choices: VERIFY_MODES,
  },
  {
    name: "--concurrency",
    type: "integer",
    description: "Maximum parallel remote operations",
    constraints: { min: 1 },
  },
  {
    name: "--dry-run",
    type: "boolean",
    description: "Evaluate the graph and print the planned outputs without writing",
    defaultValue: false,
  },
  {
    name: "--report",
    type: "string",
    description: "Write the run report as JSON to this path",
  },
  {
    name: "--list-node-types",
    type: "boolean",
    description: "Print the supported node types and exit",
    defaultValue: false,
  },
];

const HELP_TEXT = formatHelp(
  "playgraph [options] [node-file ...]",
  "Evaluate the node graph defined in the given YAML or JSON files and bring\nevery output playlist in line with it. Without files, every node file in\nthe configured userConfigDir is used.",
  ARG_DEFS,
  ["playgraph --dry-run nodes/genres.yaml", "playgraph --verify-mode incremental --report report.json"]
);

export interface CliDependencies {
  loadConfig: (configPath?: string) => Promise<PlaygraphConfig>;
  createProvider: (config: PlaygraphConfig, logger: PlaygraphLogger) => PlaylistProvider;
  logger: PlaygraphLogger;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Aborted on SIGINT by default */
  signal?: AbortSignal;
}

function defaultDependencies(): CliDependencies {
  return {
    loadConfig,
    createProvider: (config, logger) => createSpotifyProvider(config.spotify, process.env, logger),
    logger: createLogger("playgraph"),
    stdout: process.stdout,
    stderr: process.stderr,
  };
}

export function parsePlaygraphArgs(argv: string[]) {
  return parseArgs<PlaygraphCliOptions>(argv, ARG_DEFS, { allowPositional: true });
}

export function formatNodeTypes(): string {
  const types = listNodeTypes();
  const width = Math.max(...types.map((type) => type.kind.length));
  const lines = types.map(
    (type) => `${type.kind.padEnd(width)}  ${type.role.padEnd(9)}  ${type.arity.padEnd(8)}  ${type.summary}`
  );
  return `${lines.join("\n")}\n`;
}

function formatOutput(name: string, output: OutputReport): string {
  const target = `  ${name} -> "${output.playlistName}"`;
  switch (output.status) {
    case "success":
      return `${target}: success, ${output.trackCount} track(s), +${output.addedCount} -${output.removedCount} moved ${output.movedCount}`;
    case "planned":
      return `${target}: planned, ${output.trackCount} track(s)`;
    case "failed":
      return `${target}: failed: ${output.error ?? "unknown error"}`;
  }
}

export function formatRunSummary(report: RunReport, dryRun: boolean): string {
  const outputs = Object.entries(report.outputs);
  const lines = [
    `Run ${report.state}${dryRun ? " (dry run)" : ""}: ${outputs.length} output(s), ${report.apiCalls} API call(s)`,
    ...outputs.map(([name, output]) => formatOutput(name, output)),
  ];
  return `${lines.join("\n")}\n`;
}

export function reportToJson(report: RunReport): JsonValue {
  const outputs: { [name: string]: JsonValue } = {};
  for (const [name, output] of Object.entries(report.outputs)) {
    const entry: { [key: string]: JsonValue } = {
      status: output.status,
      playlistName: output.playlistName,
      addedCount: output.addedCount,
      removedCount: output.removedCount,
      movedCount: output.movedCount,
      trackCount: output.trackCount,
    };
    if (output.error !== undefined) {
      entry.error = output.error;
    }
    outputs[name] = entry;
  }
  return { state: report.state, apiCalls: report.apiCalls, outputs };
}

async function resolveNodeFiles(positional: readonly string[], config: PlaygraphConfig): Promise<string[]> {
  if (positional.length > 0) {
    return positional.map((file) => path.resolve(file));
  }
  const files = await discoverUserConfigFiles(config.userConfigDir);
  if (files.length === 0) {
    throw new ConfigurationError(`No node files found in ${config.userConfigDir}`);
  }
  return files;
}

export async function runPlaygraphCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  const result = parsePlaygraphArgs(argv);

  const exitCode = handleParseResult(result, HELP_TEXT, deps.stdout, deps.stderr);
  if (exitCode !== undefined) {
    return exitCode;
  }

  const { options, positional } = result;

  if (options.listNodeTypes) {
    deps.stdout.write(formatNodeTypes());
    return 0;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    deps.logger.warn("Interrupted; finishing in-flight calls and stopping");
    controller.abort();
  };
  if (!deps.signal) {
    process.once("SIGINT", onInterrupt);
  }

  try {
    const config = await deps.loadConfig(options.config);
    const files = await resolveNodeFiles(positional, config);
    deps.logger.debug(`Loading node files: ${files.join(", ")}`);
    const mapping = await loadUserConfigs(files);

    const { report } = await runPlaylistGraph(mapping, {
      provider: deps.createProvider(config, deps.logger),
      logger: deps.logger,
      signal: deps.signal ?? controller.signal,
      concurrency: options.concurrency ?? config.concurrency,
      verifyMode: options.verifyMode ?? config.verifyMode,
      requestTimeoutMs: config.requestTimeoutMs,
      retry: config.retry,
      dryRun: options.dryRun,
    });

    deps.stdout.write(formatRunSummary(report, options.dryRun));
    if (options.report) {
      await ensureDir(path.dirname(path.resolve(options.report)));
      await writeFile(options.report, stringifyDeterministic(reportToJson(report)), "utf8");
    }
    return isRunSuccessful(report) ? 0 : 1;
  } catch (error) {
    deps.stderr.write(`playgraph failed: ${describeError(error)}\n`);
    return 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // npm links bin scripts, so compare real paths
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runPlaygraphCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
