export class PlaygraphError extends Error {
  declare cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Raised before any remote call; the whole run stops and nothing is mutated. */
export class ConfigurationError extends PlaygraphError {}

export class InvalidNodeError extends ConfigurationError {
  readonly node: string;
  readonly field?: string;

  constructor(node: string, message: string, field?: string) {
    super(field ? `Node <${node}>: ${field}: ${message}` : `Node <${node}>: ${message}`);
    this.node = node;
    this.field = field;
  }
}

export class UnknownReferenceError extends ConfigurationError {
  readonly node: string;
  readonly reference: string;

  constructor(node: string, reference: string) {
    super(`Node <${node}> references undefined input "${reference}"`);
    this.node = node;
    this.reference = reference;
  }
}

export class CyclicGraphError extends ConfigurationError {
  /** Node names along the cycle; the first name is repeated at the end. */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Node graph contains a cycle: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class TemplateExpansionError extends ConfigurationError {
  readonly template: string;
  readonly instanceIndex?: number;
  readonly field?: string;

  constructor(template: string, message: string, details: { instanceIndex?: number; field?: string } = {}) {
    const location = [
      details.instanceIndex !== undefined ? `instance ${details.instanceIndex}` : undefined,
      details.field !== undefined ? `field "${details.field}"` : undefined,
    ]
      .filter((part): part is string => part !== undefined)
      .join(", ");
    super(`Template <${template}>${location ? ` (${location})` : ""}: ${message}`);
    this.template = template;
    this.instanceIndex = details.instanceIndex;
    this.field = details.field;
  }
}

export class DuplicateNodeError extends ConfigurationError {
  readonly node: string;

  constructor(node: string, origin: string) {
    super(`Node name "${node}" is defined more than once (${origin})`);
    this.node = node;
  }
}

/** Bad data met while evaluating one node; scoped to that node's subgraph. */
export class EvaluationError extends PlaygraphError {
  readonly node: string;

  constructor(node: string, message: string, options?: { cause?: unknown }) {
    super(`Node <${node}>: ${message}`, options);
    this.node = node;
  }
}

export class ProviderError extends PlaygraphError {
  readonly retryable: boolean = false;
}

export class TransientProviderError extends ProviderError {
  override readonly retryable = true;
  /** Server-suggested wait before the next attempt */
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class PermanentProviderError extends ProviderError {}

/** Remote playlist contents did not match what was written. */
export class ReconciliationError extends PlaygraphError {
  readonly retryable = true;
}

export class RunCancelledError extends PlaygraphError {
  constructor(message = "Run was cancelled") {
    super(message);
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof TransientProviderError || error instanceof ReconciliationError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
