import type {
  ArtifactGenerator,
  Batch,
  CacheRecord,
  CacheStore,
  EventListener,
  OptimizerEvent,
  OptimizerSettings,
  OptimizerState,
  Strategy,
  TraceCanvas,
} from '../types.js';
import {
  CacheError,
  ConfigurationError,
  LedgerError,
  OutputNotReadyError,
  SearchExhaustedError,
  SearchFinishedError,
  SearchNotConvergedError,
} from '../errors.js';
import { strategyFromName } from '../strategies/index.js';
import { FileCacheStore } from './cache.js';
import { Ledger, batchArtifactName } from './ledger.js';
import { checkArtifactName, checkOptimizerName, resolveSettings, type ResolvedSettings } from './settings.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Overrides keyed by the number of the batch being generated. A strategy
 * override stays in effect for every later batch.
 */
export type BatchOverrides<T> = Partial<Record<number, T>>;

export interface GenerateOptions {
  overrideValues?: BatchOverrides<number>;
  ignoreStop?: BatchOverrides<boolean>;
  overrideStrategies?: BatchOverrides<Strategy>;
}

export type GenerateOutcome =
  | { generated: true; batch: Batch }
  | { generated: false };

/**
 * Wiring shared by every optimizer, whether it starts fresh or resumes.
 */
export interface OptimizerOptions {
  /** Unique name. Used in generated artifact names and as the cache key. */
  name: string;
  settings: OptimizerSettings;
  generator: ArtifactGenerator;
  /** Defaults to a `FileCacheStore` in the working directory. */
  cache?: CacheStore;
  onEvent?: EventListener;
}

export interface CreateOptions extends OptimizerOptions {
  /** The caller-supplied starting point, already simulated. */
  firstBatch: Omit<Batch, 'batchNo'>;
  /** Variable value the first batch was simulated with. */
  initialValue: number;
}

export interface BatchResult {
  batch: Batch;
  variableValue: number;
  outputValue: number;
}

export interface PlotOptions {
  showNextValue?: boolean;
  showStrategy?: boolean;
}

/** Starting state handed to the constructor by `create()` or `restore()`. */
export interface OptimizerSeed {
  ledger: Ledger;
  nextVariableValue: number;
  variableValues: number[];
  outputValues: number[];
  strategy?: Strategy;
  stopped: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// OPTIMIZER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Searches one design variable until a measured output is within tolerance of
 * its target.
 *
 * Each cycle analyzes the current batch, appends the result to the history,
 * and (unless converged) asks the active strategy for the next value and has
 * the generator materialize the next batch. State is persisted after every
 * analysis and every generation.
 *
 * Subclasses supply the quantities they can measure and how a batch is
 * measured.
 */
export abstract class SingleParamOptimizer {
  readonly name: string;
  readonly settings: ResolvedSettings;

  protected readonly ledger: Ledger;
  private readonly generator: ArtifactGenerator;
  private readonly cache: CacheStore;
  private readonly onEvent?: EventListener;

  private readonly variableValues: number[];
  private readonly outputValues: number[];
  private activeStrategy: Strategy;
  private pendingValue: number;
  private currentState: OptimizerState;

  /**
   * @param quantities - target quantities the subclass can measure
   */
  protected constructor(
    options: OptimizerOptions,
    seed: OptimizerSeed,
    quantities: readonly string[]
  ) {
    checkOptimizerName(options.name);
    this.settings = resolveSettings(options.settings);
    if (!quantities.includes(this.settings.targetQuantity)) {
      throw new ConfigurationError(
        `Cannot optimize for '${this.settings.targetQuantity}'. Can only optimize for ${quantities.join(', ')}`
      );
    }

    this.name = options.name;
    this.generator = options.generator;
    this.cache = options.cache ?? new FileCacheStore();
    this.onEvent = options.onEvent;

    this.ledger = seed.ledger;
    this.variableValues = seed.variableValues;
    this.outputValues = seed.outputValues;
    this.pendingValue = seed.nextVariableValue;
    this.activeStrategy = seed.strategy ?? this.settings.strategy;
    this.currentState = seed.stopped
      ? 'STOPPED'
      : seed.variableValues.length > 0
        ? 'SEARCHING'
        : 'INITIALIZING';
  }

  /**
   * Measure the target quantity for a batch. Throws `OutputNotReadyError`
   * when the solver output is not there yet.
   */
  protected abstract measure(batch: Batch, quantity: string): Promise<number>;

  // ─────────────────────────────────────────────────────────────────────────
  // Construction helpers for subclasses
  // ─────────────────────────────────────────────────────────────────────────

  protected static freshSeed(options: CreateOptions): OptimizerSeed {
    checkArtifactName(options.firstBatch.artifactName);
    if (!Number.isFinite(options.initialValue)) {
      throw new ConfigurationError('initialValue must be a finite number');
    }
    return {
      ledger: new Ledger(options.firstBatch, options.settings),
      nextVariableValue: options.initialValue,
      variableValues: [],
      outputValues: [],
      stopped: false,
    };
  }

  protected static async cachedSeed(options: OptimizerOptions): Promise<OptimizerSeed> {
    checkOptimizerName(options.name);
    const cache = options.cache ?? new FileCacheStore();
    const record = await cache.read(options.name);
    const strategy =
      record.strategy === options.settings.strategy.name
        ? options.settings.strategy
        : strategyFromName(record.strategy);

    const ledger = Ledger.fromBatches(record.ledger, options.settings);
    const analyzed = record.variableValues.length;
    if (ledger.size < analyzed || ledger.size > analyzed + 1) {
      throw new CacheError(
        `Cached state for '${options.name}' has ${analyzed} analyzed batches but ${ledger.size} generated`
      );
    }

    return {
      ledger,
      nextVariableValue: record.nextVariableValue,
      variableValues: [...record.variableValues],
      outputValues: [...record.outputValues],
      strategy,
      stopped: record.stopped,
    };
  }

  /**
   * First analyze + propose cycle. A batch 1 without output leaves the
   * optimizer WAITING rather than failing construction.
   */
  protected async start(): Promise<void> {
    try {
      await this.analyzeBatch();
    } catch (error) {
      if (error instanceof OutputNotReadyError) {
        return;
      }
      throw error;
    }
    await this.generateNextBatch();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Batch numbering
  // ─────────────────────────────────────────────────────────────────────────

  get state(): OptimizerState {
    return this.currentState;
  }

  get strategy(): Strategy {
    return this.activeStrategy;
  }

  get previousBatchNo(): number {
    return this.variableValues.length;
  }

  /** The batch awaiting analysis, or about to be generated. */
  get currentBatchNo(): number {
    return this.variableValues.length + 1;
  }

  get nextBatchNo(): number {
    return this.currentBatchNo + 1;
  }

  /** Variable value the current batch was (or will be) generated with. */
  get nextVariableValue(): number {
    return this.pendingValue;
  }

  get history(): { variableValues: readonly number[]; outputValues: readonly number[] } {
    return {
      variableValues: [...this.variableValues],
      outputValues: [...this.outputValues],
    };
  }

  get batches(): Batch[] {
    return this.ledger.toArray();
  }

  /**
   * True when the last analysis succeeded but the next batch has not been
   * generated yet, e.g. after resuming from a cache written in between.
   */
  get awaitingGeneration(): boolean {
    return (
      this.currentState !== 'STOPPED' &&
      this.variableValues.length > 0 &&
      !this.ledger.has(this.currentBatchNo)
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Analysis
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Measure the current batch and append it to the history.
   *
   * @throws SearchFinishedError once the search has stopped
   * @throws LedgerError when the current batch was never generated
   * @throws OutputNotReadyError when the solver has not produced output yet
   */
  async analyzeBatch(): Promise<void> {
    if (this.currentState === 'STOPPED') {
      throw new SearchFinishedError(this.name);
    }

    const batchNo = this.currentBatchNo;
    const batch = this.ledger.get(batchNo);
    this.emit({ type: 'analysis-start', optimizer: this.name, batchNo });

    let value: number;
    try {
      value = await this.measure(batch, this.settings.targetQuantity);
    } catch (error) {
      if (error instanceof OutputNotReadyError) {
        this.currentState = 'WAITING';
        this.emit({ type: 'output-not-ready', optimizer: this.name, batchNo });
      }
      throw error;
    }

    if (!Number.isFinite(value)) {
      throw new ConfigurationError(
        `Analysis of batch ${batchNo} returned ${String(value)}, expected a finite number`
      );
    }

    this.variableValues.push(this.pendingValue);
    this.outputValues.push(value);
    this.currentState = 'SEARCHING';
    this.emit({
      type: 'batch-analyzed',
      optimizer: this.name,
      batchNo,
      variableValue: this.pendingValue,
      outputValue: value,
      quantity: this.settings.targetQuantity,
    });

    await this.persist();
  }

  /**
   * `target*(1-tol) <= last output <= target*(1+tol)`, bounds inclusive.
   */
  hasReachedOptimization(): boolean {
    if (this.outputValues.length === 0) {
      return false;
    }
    const last = this.outputValues[this.outputValues.length - 1];
    const { targetValue, tolerance } = this.settings;
    const lower = targetValue * (1 - tolerance);
    const upper = targetValue * (1 + tolerance);
    return Math.min(lower, upper) <= last && last <= Math.max(lower, upper);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Generation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Generate the next batch, unless the search has converged.
   *
   * Override maps are keyed by the number of the batch being generated, which
   * is `currentBatchNo` when this is called.
   */
  async generateNextBatch(options: GenerateOptions = {}): Promise<GenerateOutcome> {
    const batchNo = this.currentBatchNo;

    if (this.variableValues.length === 0) {
      throw new LedgerError(`Batch ${batchNo} has not been analyzed yet`);
    }
    if (this.ledger.has(batchNo)) {
      throw new LedgerError(`Batch ${batchNo} has already been generated`);
    }

    if (this.hasReachedOptimization()) {
      this.emit({
        type: 'converged',
        optimizer: this.name,
        batchNo: this.previousBatchNo,
        variableValue: this.variableValues[this.variableValues.length - 1],
        outputValue: this.outputValues[this.outputValues.length - 1],
        quantity: this.settings.targetQuantity,
        variableName: this.settings.variableName,
      });
      if (options.ignoreStop?.[batchNo] !== true) {
        this.currentState = 'STOPPED';
        await this.persist();
        return { generated: false };
      }
      this.emit({ type: 'stop-ignored', optimizer: this.name, batchNo });
    }

    const strategyOverride = options.overrideStrategies?.[batchNo];
    if (strategyOverride) {
      this.activeStrategy = strategyOverride;
      this.emit({
        type: 'strategy-override',
        optimizer: this.name,
        batchNo,
        strategy: strategyOverride.name,
      });
    }

    let value = options.overrideValues?.[batchNo];
    if (value !== undefined) {
      if (!Number.isFinite(value)) {
        throw new ConfigurationError(
          `Override value for batch ${batchNo} of '${this.name}' must be a finite number`
        );
      }
      this.emit({ type: 'value-override', optimizer: this.name, batchNo, value });
    } else {
      value = this.proposeNextValue(batchNo);
    }

    const { variableName } = this.settings;
    const previous = this.ledger.get(this.previousBatchNo);
    const artifactName = batchArtifactName(batchNo, this.name, variableName, value);
    const artifactPath = this.ledger.artifactFolder(batchNo);
    const outputPath = this.ledger.outputFolder(batchNo);

    await this.generator.generate({
      baseName: previous.artifactName,
      basePath: previous.artifactPath,
      outputName: artifactName,
      outputPath: artifactPath,
      substitutions: { [variableName]: value },
    });

    const batch = this.ledger.add({ batchNo, artifactName, artifactPath, outputPath });
    this.pendingValue = value;
    this.currentState = 'SEARCHING';
    this.emit({
      type: 'batch-generated',
      optimizer: this.name,
      batchNo,
      value,
      artifactName,
    });

    await this.persist();
    return { generated: true, batch };
  }

  /**
   * Ask the active strategy for a value and clamp it into the configured
   * bounds.
   *
   * @throws SearchExhaustedError when clamping lands on a value already tried
   */
  private proposeNextValue(batchNo: number): number {
    const { targetValue, correlation, meshSize, minValue, maxValue } = this.settings;
    const strategy = this.activeStrategy;

    const proposed = strategy.nextValue({
      currentOutput: this.outputValues[this.outputValues.length - 1],
      targetOutput: targetValue,
      variableValues: [...this.variableValues],
      outputValues: [...this.outputValues],
      correlation,
      meshSize,
      onFallback: (from, to) =>
        this.emit({ type: 'strategy-fallback', optimizer: this.name, batchNo, from, to }),
    });

    let bound: 'min' | 'max' | undefined;
    let value = proposed;
    if (minValue !== undefined && proposed < minValue) {
      bound = 'min';
      value = minValue;
    } else if (maxValue !== undefined && proposed > maxValue) {
      bound = 'max';
      value = maxValue;
    }
    if (bound === undefined) {
      return proposed;
    }

    this.emit({
      type: 'clamped',
      optimizer: this.name,
      batchNo,
      proposed,
      clampedTo: value,
      bound,
      strategy: strategy.name,
    });
    // A bound that was already tried would be generated again on every batch.
    if (this.variableValues.includes(value)) {
      throw new SearchExhaustedError(strategy.name);
    }
    return value;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Results
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * The converged batch.
   *
   * @throws SearchNotConvergedError when the last analysis was out of tolerance
   */
  get optimized(): BatchResult {
    if (!this.hasReachedOptimization()) {
      throw new SearchNotConvergedError(this.name);
    }
    return this.resultAt(this.outputValues.length - 1);
  }

  /**
   * The converged batch if there is one, otherwise the analyzed batch whose
   * output is closest to the target (earliest wins a tie).
   *
   * @throws SearchNotConvergedError when nothing has been analyzed yet
   */
  closest(): BatchResult {
    if (this.hasReachedOptimization()) {
      return this.optimized;
    }
    if (this.outputValues.length === 0) {
      throw new SearchNotConvergedError(this.name);
    }

    const { targetValue } = this.settings;
    let best = 0;
    for (let i = 1; i < this.outputValues.length; i++) {
      if (
        Math.abs(this.outputValues[i] - targetValue) <
        Math.abs(this.outputValues[best] - targetValue)
      ) {
        best = i;
      }
    }
    return this.resultAt(best);
  }

  private resultAt(index: number): BatchResult {
    return {
      batch: this.ledger.get(index + 1),
      variableValue: this.variableValues[index],
      outputValue: this.outputValues[index],
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Presentation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Draw analyzed points, the target, the pending value and the strategy's
   * fit.
   */
  plot(canvas: TraceCanvas, options: PlotOptions = {}): void {
    const { showNextValue = true, showStrategy = true } = options;
    const { targetValue, targetQuantity } = this.settings;

    canvas.scatter(
      this.variableValues.map((x, i) => ({
        x,
        y: this.outputValues[i],
        label: String(i + 1),
      })),
      { marker: 'dot', label: this.name }
    );
    canvas.horizontalLine(targetValue, targetQuantity);

    if (showNextValue && this.ledger.has(this.currentBatchNo)) {
      canvas.scatter(
        [{ x: this.pendingValue, y: targetValue, label: String(this.currentBatchNo) }],
        { marker: 'cross', label: 'next' }
      );
    }

    if (showStrategy && this.variableValues.length > 0) {
      this.activeStrategy.renderTrace(
        canvas,
        [...this.variableValues],
        [...this.outputValues],
        targetValue
      );
    }
  }

  describe(): string {
    const { variableName, targetQuantity, targetValue } = this.settings;
    return [
      `Optimizer: ${this.name}`,
      `  strategy: ${this.activeStrategy.name}`,
      `  state: ${this.currentState}`,
      `  current batch: ${this.currentBatchNo}`,
      `  variable: ${variableName}`,
      `  target: ${targetQuantity} = ${targetValue}`,
    ].join('\n');
  }

  toString(): string {
    return this.describe();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────────────

  snapshot(): CacheRecord {
    return {
      name: this.name,
      variableValues: [...this.variableValues],
      outputValues: [...this.outputValues],
      ledger: this.ledger.toArray(),
      nextVariableValue: this.pendingValue,
      strategy: this.activeStrategy.name,
      stopped: this.currentState === 'STOPPED',
    };
  }

  private async persist(): Promise<void> {
    await this.cache.write(this.snapshot());
  }

  protected emit(event: OptimizerEvent): void {
    this.onEvent?.(event);
  }
}
