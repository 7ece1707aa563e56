/**
 * Error hierarchy for the logic-tree engine
 * Provides structured error handling with codes and context
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  filename?: string;
  lineno?: number | '?';
  tag?: string; // Raw node tag that failed to parse
  sourceId?: string;
  branchId?: string;
  uncertaintyType?: string;
  setting?: string; // Option key for configuration errors
  value?: unknown; // Offending value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  location?: string;
}

export interface EngineErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all engine errors
 */
export abstract class EngineError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  constructor(params: EngineErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and the offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#stripValue(this.context) : this.context,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      location: formatLocation(this.context),
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return getExitCode(this.errorCode);
  }

  #stripValue(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Anything that can point at a location in a logic-tree document
 */
export interface NodeLocation {
  tag?: string;
  lineno?: number;
}

/**
 * Logic tree file contains a logic error.
 *
 * `node` is either the offending node (its `lineno` is used when present) or
 * a bare line number. Renders as `filename '<file>', line <line>: <message>`.
 */
export class LogicTreeError extends EngineError {
  public readonly filename: string;
  public readonly lineno: number | '?';
  public readonly reason: string;

  constructor(
    node: NodeLocation | number | undefined,
    filename: string,
    message: string,
    cause?: Error
  ) {
    const lineno =
      typeof node === 'number' ? node : (node?.lineno ?? ('?' as const));
    super({
      message: `filename '${filename}', line ${lineno}: ${message}`,
      errorCode: ErrorCode.MALFORMED_UNCERTAINTY,
      context: {
        filename,
        lineno,
        tag: typeof node === 'number' ? undefined : node?.tag,
      },
      cause,
    });
    this.filename = filename;
    this.lineno = lineno;
    this.reason = message;
  }
}

/**
 * Invalid geometry primitive (point out of range, degenerate line)
 */
export class GeometryError extends EngineError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INVALID_GEOMETRY, context });
  }
}

/**
 * Programming-contract violation: unknown uncertainty tag, filter key or
 * source type, values of the wrong shape, malformed weights
 */
export class ContractViolationError extends EngineError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.CONTRACT_VIOLATION, context });
  }
}

/**
 * Collapsing requested on a source the fan-out cannot represent
 */
export class CollapseNotSupportedError extends EngineError {
  constructor(sourceDescription: string, context?: ErrorContext) {
    super({
      message: `Collapsing of the logic tree is not implemented for ${sourceDescription}`,
      errorCode: ErrorCode.COLLAPSE_NOT_SUPPORTED,
      context,
    });
  }
}

export class BranchNotFoundError extends EngineError {
  public readonly branchId: string;

  constructor(branchId: string, bsetDescription: string) {
    super({
      message: `Branch '${branchId}' not found in branch set ${bsetDescription}`,
      errorCode: ErrorCode.BRANCH_NOT_FOUND,
      context: { branchId },
    });
    this.branchId = branchId;
  }
}

/**
 * Raised under the strict path policy when a path runs out of branch sets
 * before all of its ids are consumed
 */
export class LogicTreePathError extends EngineError {
  public readonly unconsumed: readonly string[];

  constructor(unconsumed: readonly string[], lastBranchId: string) {
    super({
      message: `Branch '${lastBranchId}' has no child branch set; unconsumed ids: ${unconsumed.join(', ')}`,
      errorCode: ErrorCode.PATH_NOT_CONSUMED,
      context: { branchId: lastBranchId, value: [...unconsumed] },
    });
    this.unconsumed = unconsumed;
  }
}

export class UnsupportedModificationError extends EngineError {
  constructor(modification: string, target: string) {
    super({
      message: `Modification ${modification} is not supported by ${target}`,
      errorCode: ErrorCode.UNSUPPORTED_MODIFICATION,
      context: { modification, target },
    });
  }
}

/**
 * A supported modification whose parameters would leave the target invalid
 */
export class ModificationError extends EngineError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INVALID_MODIFICATION, context });
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, setting: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting },
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

export function formatLocation(context?: ErrorContext): string | undefined {
  if (!context?.filename) return undefined;
  return `${context.filename}:${context.lineno ?? '?'}`;
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
