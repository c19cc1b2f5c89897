import { z } from "zod";

/**
 * Canonical taxonomy of the failures raised by the graph and the path
 * searches. Each entry carries the stable machine-readable code and the
 * default message used when callers do not provide a more specific one.
 */
export const GRAPH_ERROR_TAXONOMY = {
  INVALID_ARGUMENT: { code: "E-GRAPH-INVALID-ARGUMENT", message: "Invalid argument" },
  PRECONDITION_VIOLATION: { code: "E-SEARCH-PRECONDITION", message: "Search precondition violated" },
  INTERNAL: { code: "E-GRAPH-INTERNAL", message: "Internal error" },
} as const;

/** Union of the supported error categories. */
export type GraphErrorCategory = keyof typeof GRAPH_ERROR_TAXONOMY;

/** Machine-readable code attached to every {@link GraphError}. */
export type GraphErrorCode = (typeof GRAPH_ERROR_TAXONOMY)[GraphErrorCategory]["code"];

/** Optional knobs enriching a {@link GraphError}. */
export interface GraphErrorOptions {
  hint?: string;
  details?: unknown;
}

/**
 * Base class of every typed error thrown by the library. Subclasses only fix
 * the category; the options bag lets call sites attach a hint and structured
 * details that end up in logs and CLI output.
 */
export class GraphError extends Error {
  readonly category: GraphErrorCategory;
  readonly code: GraphErrorCode;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(category: GraphErrorCategory, message?: string, options: GraphErrorOptions = {}) {
    const taxonomy = GRAPH_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a caller hands the graph an unknown vertex or an unusable weight. */
export class InvalidArgumentError extends GraphError {
  constructor(message?: string, options: GraphErrorOptions = {}) {
    super("INVALID_ARGUMENT", message, options);
  }
}

/** Raised before a search starts when its inputs cannot yield a meaningful answer. */
export class PreconditionViolationError extends GraphError {
  constructor(message?: string, options: GraphErrorOptions = {}) {
    super("PRECONDITION_VIOLATION", message, options);
  }
}

/** Broken internal invariant, e.g. a predecessor chain that never reaches the start. */
export class InternalError extends GraphError {
  constructor(message?: string, options: GraphErrorOptions = {}) {
    super("INTERNAL", message, options);
  }
}

/** Maximum number of characters preserved in normalised messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/** Collapses whitespace and truncates the text with an ellipsis past the limit. */
export function normaliseErrorText(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const value = collapsed.length > 0 ? collapsed : fallback;
  if (value.length <= ERROR_TEXT_MAX_LENGTH) {
    return value;
  }
  return `${value.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Renders a vertex payload or thrown value for messages and log fields.
 * Values `String` cannot convert (null-prototype objects, throwing
 * `toString` overrides) fall back to their `[object Tag]` form.
 */
export function describePayload(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/** Structured view of a thrown value, suitable for logs and CLI output. */
export interface NormalisedError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/**
 * Normalises an arbitrary thrown value. Typed graph errors keep their code,
 * zod failures map to the invalid-argument code and anything else falls back
 * to the internal code.
 */
export function normaliseError(error: unknown): NormalisedError {
  if (error instanceof GraphError) {
    return {
      code: error.code,
      message: normaliseErrorText(error.message),
      ...(error.hint !== undefined ? { hint: normaliseErrorText(error.hint) } : {}),
      ...(error.details !== undefined ? { details: error.details } : {}),
    };
  }
  if (error instanceof z.ZodError) {
    return {
      code: GRAPH_ERROR_TAXONOMY.INVALID_ARGUMENT.code,
      message: normaliseErrorText(error.issues.map((issue) => issue.message).join("; ")),
      hint: "invalid_input",
      details: { issues: error.issues },
    };
  }
  const message = error instanceof Error ? error.message : describePayload(error);
  return { code: GRAPH_ERROR_TAXONOMY.INTERNAL.code, message: normaliseErrorText(message) };
}
