/**
 * Error Handler
 *
 * Error taxonomy and error values for the dispatcher. Dispatch never throws:
 * every failure travels back to the caller as a DispatchError value.
 */

/**
 * Dispatcher error codes
 */
export enum DispatchErrorCode {
  // Input Errors (1xx)
  INVALID_INPUT = 100,
  ENTITY_DROPPED = 101,

  // Resolution Outcomes (2xx)
  AMBIGUOUS_INTENT = 200,
  UNRECOGNIZED = 201,

  // Context (3xx)
  CONTEXT_OVERFLOW = 300,
  SESSION_NOT_FOUND = 301,
  INVALID_TRANSITION = 302,

  // Registry / Config (4xx)
  REGISTRY_INVALID = 400,
  CONFIG_LOAD_FAILED = 401,

  // Execution Errors (5xx)
  EXECUTOR_NOT_FOUND = 500,
  EXECUTOR_FAILED = 501,

  // General Errors (9xx)
  INTERNAL_ERROR = 900,
}

/**
 * Suggested recovery for an error
 */
export interface RecoveryAction {
  /** Type of recovery */
  type: "retry" | "clarify" | "modify" | "abort" | "fallback";

  /** Human-readable description */
  description: string;
}

/**
 * Dispatcher error value
 */
export interface DispatchError {
  /** Error code */
  code: DispatchErrorCode;

  /** Human-readable message */
  message: string;

  /** Related intent if available */
  intent?: string;

  /** Suggested recovery action */
  recovery?: RecoveryAction;

  /** Whether the caller can recover (e.g. with a follow-up utterance) */
  recoverable: boolean;

  /** Timestamp */
  timestamp: Date;
}

/**
 * Error statistics for monitoring
 */
export interface ErrorStats {
  total: number;
  byCode: Partial<Record<DispatchErrorCode, number>>;
  byIntent: Record<string, number>;
  lastError?: Date;
}

/**
 * Thrown by registry construction when intent definitions are invalid.
 * Only raised at process start, never from dispatch.
 */
export class RegistryValidationError extends Error {
  readonly code = DispatchErrorCode.REGISTRY_INVALID;

  constructor(readonly issues: string[]) {
    super(`Invalid intent registry:\n  - ${issues.join("\n  - ")}`);
    this.name = "RegistryValidationError";
  }
}

/**
 * Thrown when the configuration file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  readonly code = DispatchErrorCode.CONFIG_LOAD_FAILED;

  constructor(
    message: string,
    readonly path: string
  ) {
    super(`${message} (${path})`);
    this.name = "ConfigLoadError";
  }
}

const NON_RECOVERABLE_CODES: ReadonlySet<DispatchErrorCode> = new Set([
  DispatchErrorCode.REGISTRY_INVALID,
  DispatchErrorCode.EXECUTOR_NOT_FOUND,
  DispatchErrorCode.INVALID_TRANSITION,
  DispatchErrorCode.INTERNAL_ERROR,
]);

/**
 * Suggest recovery action based on error code
 */
export function suggestRecovery(code: DispatchErrorCode): RecoveryAction | undefined {
  switch (code) {
    case DispatchErrorCode.INVALID_INPUT:
      return {
        type: "retry",
        description: "Nothing was heard, try saying the command again",
      };

    case DispatchErrorCode.AMBIGUOUS_INTENT:
      return {
        type: "clarify",
        description: "Ask the user which of the candidate actions they meant",
      };

    case DispatchErrorCode.UNRECOGNIZED:
      return {
        type: "fallback",
        description: "Offer help or ask the user to rephrase",
      };

    case DispatchErrorCode.ENTITY_DROPPED:
      return {
        type: "modify",
        description: "Check the entity labels against the intent registry",
      };

    case DispatchErrorCode.SESSION_NOT_FOUND:
      return {
        type: "retry",
        description: "Start a new session",
      };

    case DispatchErrorCode.EXECUTOR_NOT_FOUND:
      return {
        type: "abort",
        description: "Register an action executor for this intent",
      };

    case DispatchErrorCode.EXECUTOR_FAILED:
      return {
        type: "retry",
        description: "The action failed, report it and try again",
      };

    case DispatchErrorCode.CONFIG_LOAD_FAILED:
      return {
        type: "modify",
        description: "Fix the configuration file and restart",
      };

    default:
      return undefined;
  }
}

/**
 * Build an error value without recording it anywhere
 */
export function createDispatchError(
  code: DispatchErrorCode,
  message: string,
  options: {
    intent?: string;
    recoverable?: boolean;
    timestamp?: Date;
  } = {}
): DispatchError {
  return {
    code,
    message,
    intent: options.intent,
    recovery: suggestRecovery(code),
    recoverable: options.recoverable ?? !NON_RECOVERABLE_CODES.has(code),
    timestamp: options.timestamp ?? new Date(),
  };
}

/**
 * Error handler class
 *
 * Keeps a bounded log of errors seen by a session manager or router.
 */
export class DispatchErrorHandler {
  private errorLog: DispatchError[] = [];
  private maxLogSize: number;

  constructor(options: { maxLogSize?: number } = {}) {
    this.maxLogSize = options.maxLogSize || 100;
  }

  /**
   * Create and log an error
   */
  createError(
    code: DispatchErrorCode,
    message: string,
    options: { intent?: string; recoverable?: boolean } = {}
  ): DispatchError {
    const error = createDispatchError(code, message, options);
    this.record(error);
    return error;
  }

  /**
   * Log an existing error value
   */
  record(error: DispatchError): void {
    this.errorLog.push(error);

    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }
  }

  /**
   * Get error statistics
   */
  getStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errorLog.length,
      byCode: {},
      byIntent: {},
      lastError: this.errorLog[this.errorLog.length - 1]?.timestamp,
    };

    for (const error of this.errorLog) {
      stats.byCode[error.code] = (stats.byCode[error.code] ?? 0) + 1;

      if (error.intent) {
        stats.byIntent[error.intent] = (stats.byIntent[error.intent] ?? 0) + 1;
      }
    }

    return stats;
  }

  /**
   * Get recent errors
   */
  getRecentErrors(limit: number = 10): DispatchError[] {
    return this.errorLog.slice(-limit);
  }

  /**
   * Clear error log
   */
  clearLog(): void {
    this.errorLog = [];
  }

  /**
   * Format error for display
   */
  formatError(error: DispatchError): string {
    let message = `[${error.code}] ${error.message}`;

    if (error.recovery) {
      message += `\n  Recovery: ${error.recovery.description}`;
    }

    return message;
  }
}

/**
 * Create error handler instance
 */
export function createErrorHandler(
  options: { maxLogSize?: number } = {}
): DispatchErrorHandler {
  return new DispatchErrorHandler(options);
}
