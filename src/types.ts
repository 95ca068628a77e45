import type { RESONATOR_QUANTITIES } from './constants.js';

// ═══════════════════════════════════════════════════════════════════════════
// STRATEGIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Sign of the relationship between the variable and the measured output.
 * +1 when increasing the variable increases the output, -1 otherwise.
 */
export type Correlation = 1 | -1;

/**
 * Everything a strategy may look at when proposing the next value.
 */
export interface StrategyInput {
  currentOutput: number;
  targetOutput: number;
  variableValues: readonly number[];
  outputValues: readonly number[];
  correlation: Correlation;
  meshSize: number;
  /** Called when a strategy hands over to a fallback strategy. */
  onFallback?: (from: string, to: string) => void;
}

/**
 * Drawing surface for strategy and optimizer traces.
 */
export interface TraceCanvas {
  line(xs: readonly number[], ys: readonly number[], label?: string): void;
  scatter(
    points: readonly TracePoint[],
    options?: { marker?: 'dot' | 'cross'; label?: string }
  ): void;
  horizontalLine(y: number, label?: string): void;
}

export interface TracePoint {
  x: number;
  y: number;
  label?: string;
}

/**
 * Pluggable policy proposing the next variable value from search history.
 */
export interface Strategy {
  readonly name: string;
  nextValue(input: StrategyInput): number;
  renderTrace(
    canvas: TraceCanvas,
    variableValues: readonly number[],
    outputValues: readonly number[],
    targetOutput: number
  ): void;
}

// ═══════════════════════════════════════════════════════════════════════════
// BATCHES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Identity and location of the artifact produced for one batch.
 */
export interface Batch {
  readonly batchNo: number;
  /** Artifact name without the simulation file extension. */
  readonly artifactName: string;
  readonly artifactPath: string;
  readonly outputPath: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Immutable configuration of a single-parameter optimizer.
 */
export interface OptimizerSettings {
  /** Name of the design parameter to vary, as it appears in the artifact. */
  variableName: string;
  /** Measured quantity to optimize for, e.g. `f0`. */
  targetQuantity: string;
  targetValue: number;
  /** Fractional tolerance around `targetValue`, e.g. 0.01 for ±1%. */
  tolerance: number;
  correlation: '+' | '-';
  strategy: Strategy;
  /** Smallest change of the variable that yields a different artifact. Default 1.0. */
  meshSize?: number;
  minValue?: number;
  maxValue?: number;
  /** Folder for generated artifacts. `{batch}` is replaced by the batch number. */
  artifactFolderPattern?: string;
  /** Folder the solver writes outputs to. `{batch}` is replaced by the batch number. */
  outputFolderPattern?: string;
}

export type OptimizerState = 'INITIALIZING' | 'SEARCHING' | 'WAITING' | 'STOPPED';

// ═══════════════════════════════════════════════════════════════════════════
// COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════

export interface GenerateArtifactRequest {
  baseName: string;
  basePath: string;
  outputName: string;
  outputPath: string;
  substitutions: Record<string, number>;
}

/**
 * Materializes a new simulation input from a base artifact.
 * May throw `ArtifactNotFoundError` or `ParamNotFoundError`.
 */
export interface ArtifactGenerator {
  generate(request: GenerateArtifactRequest): Promise<void>;
}

/**
 * Turns a batch output into the scalar being optimized.
 * Throws `OutputNotReadyError` when the output does not exist yet.
 */
export interface BatchAnalyzer {
  /** Quantity names this analyzer can measure. */
  readonly quantities: readonly string[];
  analyze(artifactName: string, outputPath: string, quantity: string): Promise<number>;
}

export type ResonatorQuantity = (typeof RESONATOR_QUANTITIES)[number];

export type ResonatorMeasurement = Record<ResonatorQuantity, number>;

/**
 * Extracts single-resonator figures from a batch's S-parameter output.
 * Throws `OutputNotReadyError` when the output does not exist yet.
 */
export interface ResonatorAnalyzer {
  analyze(artifactName: string, outputPath: string): Promise<ResonatorMeasurement>;
}

// ═══════════════════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Snapshot of an optimizer's in-flight search.
 */
export interface CacheRecord {
  name: string;
  variableValues: number[];
  outputValues: number[];
  ledger: Batch[];
  /** Value the next analyzed batch was generated with. */
  nextVariableValue: number;
  strategy: string;
  stopped: boolean;
}

export interface CacheStore {
  write(record: CacheRecord): Promise<void>;
  /** Throws `CacheNotFoundError` when nothing is stored under `name`. */
  read(name: string): Promise<CacheRecord>;
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type OptimizerEvent =
  | { type: 'analysis-start'; optimizer: string; batchNo: number }
  | { type: 'batch-analyzed'; optimizer: string; batchNo: number; variableValue: number; outputValue: number; quantity: string }
  | { type: 'output-not-ready'; optimizer: string; batchNo: number }
  | { type: 'converged'; optimizer: string; batchNo: number; variableValue: number; outputValue: number; quantity: string; variableName: string }
  | { type: 'stop-ignored'; optimizer: string; batchNo: number }
  | { type: 'strategy-override'; optimizer: string; batchNo: number; strategy: string }
  | { type: 'value-override'; optimizer: string; batchNo: number; value: number }
  | { type: 'strategy-fallback'; optimizer: string; batchNo: number; from: string; to: string }
  | { type: 'clamped'; optimizer: string; batchNo: number; proposed: number; clampedTo: number; bound: 'min' | 'max'; strategy: string }
  | { type: 'batch-generated'; optimizer: string; batchNo: number; value: number; artifactName: string };

export type SchedulerEvent =
  | { type: 'round-start'; round: number; active: string[] }
  | { type: 'optimizer-waiting'; optimizer: string; batchNo: number }
  | { type: 'optimizer-finished'; optimizer: string }
  | { type: 'round-complete'; round: number; active: string[] };

export type EmtuneEvent = OptimizerEvent | SchedulerEvent;

export type EventListener = (event: EmtuneEvent) => void;
