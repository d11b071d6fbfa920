/**
 * Error handling for the simulator
 *
 * Every failure raised by the game and simulation modules is a
 * SimulationError carrying:
 * - A structured error code
 * - Context for debugging (offending door, round number, ...)
 */

/**
 * Error codes raised by the simulator
 */
export enum ErrorCode {
  // Caller errors
  INVALID_INPUT = 'INVALID_INPUT',
  CANCELLED = 'CANCELLED',

  // Invariant violations
  IMPOSSIBLE_STATE = 'IMPOSSIBLE_STATE',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Custom error class with a structured error code and context
 *
 * @example
 * ```typescript
 * throw new SimulationError(
 *   ErrorCode.INVALID_INPUT,
 *   'Door must be 1, 2 or 3',
 *   { door: 4 }
 * );
 * ```
 */
export class SimulationError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SimulationError);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a SimulationError
 */
export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}

/**
 * Wrap an unknown thrown value as a SimulationError.
 * SimulationErrors pass through untouched unless extra context is given,
 * in which case the code is kept and the context merged.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  extraContext?: Record<string, unknown>
): SimulationError {
  if (isSimulationError(error)) {
    if (!extraContext) {
      return error;
    }
    return new SimulationError(error.code, error.message, { ...error.context, ...extraContext });
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new SimulationError(code, message, { ...context, ...extraContext });
}
