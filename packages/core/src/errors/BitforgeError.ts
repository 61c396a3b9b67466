/**
 * BitforgeError - Error hierarchy for bitforge
 *
 * All errors extend the native JavaScript Error class, carry a stable code
 * and the offending identifier (flow, stage, target or file) in `context`,
 * so a caller can report them without re-deriving anything.
 *
 * Error types:
 * - FlowError: registry and flow graph construction (fatal)
 * - RuleError: command graph accumulation and validation (fatal)
 * - StageError: a stage variant rejected its options or sources (fatal)
 * - OutputError: the Makefile could not be written (fatal)
 * - ConfigError: .bitforge/config.yaml is invalid (fatal)
 *
 * None of these are retried: each one is a structural misconfiguration.
 */

export type FlowErrorCode =
  | 'ERR_UNKNOWN_FLOW'
  | 'ERR_INVALID_FLOW'
  | 'ERR_INVALID_FLOW_OPTION'
  | 'ERR_UNKNOWN_TOOL'
  | 'ERR_CYCLE_DETECTED'
  | 'ERR_MISSING_PREDECESSOR_OUTPUT';

export type RuleErrorCode =
  | 'ERR_CONFLICTING_RULE'
  | 'ERR_INVALID_RULE'
  | 'ERR_DEFAULT_TARGET_ALREADY_SET'
  | 'ERR_MISSING_DEFAULT_TARGET'
  | 'ERR_DANGLING_DEPENDENCY'
  | 'ERR_CYCLE_DETECTED'
  | 'ERR_GRAPH_FINALIZED';

export type StageErrorCode =
  | 'ERR_INVALID_OPTION'
  | 'ERR_UNSUPPORTED_SOURCE'
  | 'ERR_STAGE_FAILED';

export type OutputErrorCode = 'ERR_IO';

export type ConfigErrorCode = 'ERR_CONFIG_INVALID';

export type ErrorCode =
  | FlowErrorCode
  | RuleErrorCode
  | StageErrorCode
  | OutputErrorCode
  | ConfigErrorCode;

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  flow?: string;
  stage?: string;
  target?: string;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of BitforgeError
 */
export interface BitforgeErrorJSON {
  code: ErrorCode;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all bitforge errors.
 */
export abstract class BitforgeError extends Error {
  abstract readonly code: ErrorCode;
  readonly severity: ErrorSeverity = 'fatal';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): BitforgeErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Flow error - unknown flow, malformed descriptors, missing inputs
 */
export class FlowError extends BitforgeError {
  readonly code: FlowErrorCode;

  constructor(message: string, code: FlowErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Rule error - conflicting rules, default target misuse, graph state
 */
export class RuleError extends BitforgeError {
  readonly code: RuleErrorCode;

  constructor(message: string, code: RuleErrorCode, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Stage error - raised by stage variants, or wrapping whatever a variant threw
 */
export class StageError extends BitforgeError {
  readonly code: StageErrorCode;

  constructor(
    message: string,
    code: StageErrorCode,
    context: ErrorContext = {},
    suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, context, suggestion, options);
    this.code = code;
  }
}

/**
 * Output error - the build-rule file could not be written
 */
export class OutputError extends BitforgeError {
  readonly code: OutputErrorCode = 'ERR_IO';

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, context, undefined, options);
  }
}

/**
 * Configuration error - .bitforge/config.yaml parsing and validation
 */
export class ConfigError extends BitforgeError {
  readonly code: ConfigErrorCode = 'ERR_CONFIG_INVALID';

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
  }
}
