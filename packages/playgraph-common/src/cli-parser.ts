/**
 * Declarative argument parsing shared by the playgraph command-line tools.
 * Option definitions drive both parsing and the generated help text.
 */

export type ArgType = "string" | "boolean" | "integer" | "number";

export interface NumericConstraint {
  /** Inclusive lower bound */
  min?: number;
  /** Inclusive upper bound */
  max?: number;
}

export interface ArgDef {
  /** Long flag, e.g. "--config" */
  name: string;
  alias?: string;
  type: ArgType;
  description: string;
  defaultValue?: string | number | boolean;
  constraints?: NumericConstraint;
  /** Accepted values for string options */
  choices?: readonly string[];
  /** Flag that sets a boolean option to false, e.g. "--no-color" */
  negation?: string;
}

export interface ParseResult<T> {
  options: T;
  errors: string[];
  helpRequested: boolean;
  positional: string[];
}

export interface ParseOptions {
  allowUnknown?: boolean;
  allowPositional?: boolean;
}

const HELP_FLAGS = new Set(["--help", "-h"]);

/** "--verify-mode" becomes "verifyMode". */
export function optionKey(def: ArgDef): string {
  return def.name.replace(/^-+/, "").replace(/-([a-z])/g, (_, char: string) => char.toUpperCase());
}

function indexFlags(defs: readonly ArgDef[]): Map<string, ArgDef> {
  const flags = new Map<string, ArgDef>();
  for (const def of defs) {
    flags.set(def.name, def);
    if (def.alias) {
      flags.set(def.alias, def);
    }
    if (def.negation) {
      flags.set(def.negation, def);
    }
  }
  return flags;
}

function convertValue(def: ArgDef, raw: string | undefined): { value?: unknown; error?: string; missing?: boolean } {
  // a following flag means the value is missing; negative numbers are still values
  if (raw === undefined || (raw.startsWith("-") && !/^-\d/.test(raw))) {
    return { error: `${def.name} requires a value`, missing: true };
  }

  if (def.type === "string") {
    if (def.choices && !def.choices.includes(raw)) {
      return { error: `${def.name} must be one of ${def.choices.join(", ")}` };
    }
    return { value: raw };
  }

  const parsed = def.type === "integer" ? Number(raw) : Number.parseFloat(raw);
  if (Number.isNaN(parsed) || (def.type === "integer" && !Number.isInteger(parsed))) {
    return { error: `${def.name} must be ${def.type === "integer" ? "an integer" : "a number"}` };
  }

  const { min, max } = def.constraints ?? {};
  if (min !== undefined && parsed < min) {
    return { error: `${def.name} must be at least ${min}` };
  }
  if (max !== undefined && parsed > max) {
    return { error: `${def.name} must be at most ${max}` };
  }
  return { value: parsed };
}

export function parseArgs<T>(argv: readonly string[], defs: readonly ArgDef[], parseOptions: ParseOptions = {}): ParseResult<T> {
  const flags = indexFlags(defs);
  const options: Record<string, unknown> = {};
  const errors: string[] = [];
  const positional: string[] = [];

  for (const def of defs) {
    if (def.defaultValue !== undefined) {
      options[optionKey(def)] = def.defaultValue;
    }
  }

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (HELP_FLAGS.has(token)) {
      return { options: options as T, errors, helpRequested: true, positional };
    }

    if (!token.startsWith("-") || token === "-") {
      if (parseOptions.allowPositional) {
        positional.push(token);
      } else {
        errors.push(`Unexpected argument: ${token}`);
      }
      continue;
    }

    const def = flags.get(token);
    if (!def) {
      if (!parseOptions.allowUnknown) {
        errors.push(`Unknown option: ${token}`);
      }
      continue;
    }

    if (def.type === "boolean") {
      options[optionKey(def)] = def.negation !== token;
      continue;
    }

    const { value, error, missing } = convertValue(def, argv[index + 1]);
    if (!missing) {
      index += 1;
    }
    if (error) {
      errors.push(error);
      continue;
    }
    options[optionKey(def)] = value;
  }

  // T describes the caller's option bag; the definitions are what shape it
  return { options: options as T, errors, helpRequested: false, positional };
}

function flagLabel(def: ArgDef): string {
  const parts = def.alias ? [`${def.alias},`, def.name] : [def.name];
  if (def.type !== "boolean") {
    parts.push("<value>");
  }
  return parts.join(" ");
}

export function formatHelp(usage: string, description: string, defs: readonly ArgDef[], examples: readonly string[] = []): string {
  const width = Math.max("--help, -h".length, ...defs.map((def) => flagLabel(def).length)) + 2;
  const lines = [`Usage: ${usage}`, "", description, "", "Options:"];

  lines.push(`  ${"--help, -h".padEnd(width)}  Show this message and exit`);
  for (const def of defs) {
    let text = def.description;
    if (def.choices) {
      text += ` (${def.choices.join("|")})`;
    }
    if (def.defaultValue !== undefined) {
      text += ` (default: ${def.defaultValue})`;
    }
    lines.push(`  ${flagLabel(def).padEnd(width)}  ${text}`);
    if (def.negation) {
      lines.push(`  ${def.negation.padEnd(width)}  Disable ${def.name.replace(/^--/, "")}`);
    }
  }

  if (examples.length > 0) {
    lines.push("", "Examples:", ...examples.map((example) => `  ${example}`));
  }

  lines.push("");
  return lines.join("\n");
}

/**
 * Writes help or parse errors. Returns the exit code to stop with, or
 * undefined when the command should proceed.
 */
export function handleParseResult<T>(
  result: ParseResult<T>,
  helpText: string,
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): number | undefined {
  if (result.helpRequested) {
    stdout.write(helpText);
    return 0;
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      stderr.write(`${error}\n`);
    }
    stderr.write("Use --help to list supported options.\n");
    return 1;
  }

  return undefined;
}
