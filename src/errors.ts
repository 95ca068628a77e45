/**
 * Error taxonomy.
 *
 * Configuration errors are fatal and never retried. `OutputNotReadyError` is
 * the only recoverable condition: the scheduler pauses the optimizer for the
 * round. Search errors end a single search. Cache errors are always surfaced.
 */

export class EmtuneError extends Error {
  /** SCREAMING_SNAKE_CASE code for programmatic handling. */
  public readonly code: string;

  constructor(message: string, code: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'EmtuneError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export class ConfigurationError extends EmtuneError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// NOT READY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Thrown by analyzers when the solver has not produced the output for a
 * batch yet. Callers should poll again later.
 */
export class OutputNotReadyError extends EmtuneError {
  public readonly artifactName: string;
  public readonly outputPath: string;

  constructor(artifactName: string, outputPath: string, cause?: Error) {
    super(
      `No output for '${artifactName}' in '${outputPath}' yet.`,
      'OUTPUT_NOT_READY',
      cause
    );
    this.name = 'OutputNotReadyError';
    this.artifactName = artifactName;
    this.outputPath = outputPath;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SEARCH
// ═══════════════════════════════════════════════════════════════════════════

export class SearchExhaustedError extends EmtuneError {
  public readonly strategy: string;

  constructor(strategy: string) {
    super(
      `Strategy ${strategy} was unable to find an appropriate next variable value.`,
      'SEARCH_EXHAUSTED'
    );
    this.name = 'SearchExhaustedError';
    this.strategy = strategy;
  }
}

export class BracketNotFoundError extends EmtuneError {
  public readonly targetOutput: number;

  constructor(strategy: string, targetOutput: number) {
    super(
      `Cannot use ${strategy} because there are no points on both sides of the target output ${targetOutput}.`,
      'BRACKET_NOT_FOUND'
    );
    this.name = 'BracketNotFoundError';
    this.targetOutput = targetOutput;
  }
}

/** The optimizer has converged and no further batch was generated. */
export class SearchFinishedError extends EmtuneError {
  constructor(optimizerName: string) {
    super(`Optimizer '${optimizerName}' has finished.`, 'SEARCH_FINISHED');
    this.name = 'SearchFinishedError';
  }
}

export class SearchNotConvergedError extends EmtuneError {
  constructor(optimizerName: string) {
    super(
      `Optimizer '${optimizerName}' has not yet found an optimized value.`,
      'SEARCH_NOT_CONVERGED'
    );
    this.name = 'SearchNotConvergedError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════

export class LedgerError extends EmtuneError {
  constructor(message: string) {
    super(message, 'LEDGER_ERROR');
    this.name = 'LedgerError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════

export class CacheError extends EmtuneError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_ERROR', cause);
    this.name = 'CacheError';
  }
}

export class CacheNotFoundError extends EmtuneError {
  public readonly optimizerName: string;

  constructor(optimizerName: string, location: string) {
    super(
      `No cached state for optimizer '${optimizerName}' at '${location}'.`,
      'CACHE_NOT_FOUND'
    );
    this.name = 'CacheNotFoundError';
    this.optimizerName = optimizerName;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ARTIFACT GENERATION
// ═══════════════════════════════════════════════════════════════════════════

export class ArtifactNotFoundError extends EmtuneError {
  constructor(file: string) {
    super(`Base artifact '${file}' not found.`, 'ARTIFACT_NOT_FOUND');
    this.name = 'ArtifactNotFoundError';
  }
}

export class ParamNotFoundError extends EmtuneError {
  public readonly param: string;

  constructor(param: string, file: string) {
    super(`Parameter '${param}' not found in file '${file}'.`, 'PARAM_NOT_FOUND');
    this.name = 'ParamNotFoundError';
    this.param = param;
  }
}

/** Wrap an unknown thrown value so it can be chained as a cause. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
