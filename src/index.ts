// Re-export types
export type {
  // Strategy types
  Correlation,
  Strategy,
  StrategyInput,
  TraceCanvas,
  TracePoint,
  // Batch and settings types
  Batch,
  OptimizerSettings,
  OptimizerState,
  // Collaborator types
  ArtifactGenerator,
  GenerateArtifactRequest,
  BatchAnalyzer,
  ResonatorAnalyzer,
  ResonatorMeasurement,
  ResonatorQuantity,
  // Persistence types
  CacheRecord,
  CacheStore,
  // Event types
  OptimizerEvent,
  SchedulerEvent,
  EmtuneEvent,
  EventListener,
} from './types.js';

// Re-export optimizer types
export type {
  BatchOverrides,
  BatchResult,
  CreateOptions,
  GenerateOptions,
  GenerateOutcome,
  OptimizerOptions,
  PlotOptions,
} from './optimizer/optimizer.js';
export type { ResonatorOptimizerOptions } from './optimizer/resonator-optimizer.js';
export type { CustomOptimizerOptions } from './optimizer/custom-optimizer.js';
export type { ResolvedSettings } from './optimizer/settings.js';
export type { TraceSeries } from './optimizer/trace.js';
export type {
  IterBatchesOptions,
  IterBatchesResult,
  OptimizerOutcome,
} from './optimizer-set/optimizer-set.js';
export type { ConsoleReporterOptions } from './optimizer/optimizer-logging.js';

// Re-export constants
export { RESONATOR_QUANTITIES } from './constants.js';

// Re-export errors
export {
  EmtuneError,
  ConfigurationError,
  OutputNotReadyError,
  SearchExhaustedError,
  BracketNotFoundError,
  SearchFinishedError,
  SearchNotConvergedError,
  LedgerError,
  CacheError,
  CacheNotFoundError,
  ArtifactNotFoundError,
  ParamNotFoundError,
} from './errors.js';

// Re-export strategies
export {
  PercentScale,
  MeshStep,
  PolyFit,
  LinFit,
  CrossingPointSplit,
  strategyFromName,
} from './strategies/index.js';
export { roundToMesh } from './library/mesh.js';

// Re-export optimizers
export { SingleParamOptimizer } from './optimizer/optimizer.js';
export { ResonatorOptimizer } from './optimizer/resonator-optimizer.js';
export { CustomOptimizer } from './optimizer/custom-optimizer.js';
export { OptimizerSet } from './optimizer-set/optimizer-set.js';
export { Ledger, batchArtifactName } from './optimizer/ledger.js';
export { FileCacheStore, MemoryCacheStore, NullCacheStore } from './optimizer/cache.js';
export { SeriesCanvas } from './optimizer/trace.js';

// Re-export reporting
export {
  createConsoleReporter,
  formatEvent,
  summarizeOptimizer,
  buildOptimizerReport,
  writeOptimizerReport,
} from './optimizer/optimizer-logging.js';

// Main emtune namespace
import type { EventListener } from './types.js';
import type { CreateOptions } from './optimizer/optimizer.js';
import type { CustomOptimizerOptions } from './optimizer/custom-optimizer.js';
import type { ResonatorOptimizerOptions } from './optimizer/resonator-optimizer.js';
import type { ConsoleReporterOptions } from './optimizer/optimizer-logging.js';
import { CrossingPointSplit, LinFit, MeshStep, PercentScale, PolyFit } from './strategies/index.js';
import { CustomOptimizer } from './optimizer/custom-optimizer.js';
import { ResonatorOptimizer } from './optimizer/resonator-optimizer.js';
import { OptimizerSet } from './optimizer-set/optimizer-set.js';
import { createConsoleReporter } from './optimizer/optimizer-logging.js';

/**
 * Main emtune namespace for fluent API.
 *
 * @example
 * ```ts
 * import { emtune } from 'emtune';
 *
 * const reporter = emtune.reporter();
 * const resonator = await emtune.resonator({
 *   name: 'res_a',
 *   firstBatch: { artifactName: 'res_a_v1', artifactPath: 'batch_1_son_files', outputPath: 'batch_1_outputs' },
 *   initialValue: 400,
 *   settings: {
 *     variableName: 'length',
 *     targetQuantity: 'f0',
 *     targetValue: 2.0e9,
 *     tolerance: 0.01,
 *     correlation: '-',
 *     strategy: emtune.linFit(),
 *   },
 *   generator,
 *   analyzer,
 *   onEvent: reporter,
 * });
 *
 * const set = emtune.set([resonator], reporter);
 * const { outcomes } = await set.iterBatches();
 * ```
 */
export const emtune = {
  /**
   * Start a resonator search from an already simulated first batch.
   */
  resonator(options: ResonatorOptimizerOptions & CreateOptions): Promise<ResonatorOptimizer> {
    return ResonatorOptimizer.create(options);
  },

  /**
   * Start a search on any quantity a custom analyzer can measure.
   */
  custom(options: CustomOptimizerOptions & CreateOptions): Promise<CustomOptimizer> {
    return CustomOptimizer.create(options);
  },

  /**
   * Group optimizers so they can be advanced in rounds.
   */
  set(
    optimizers: readonly (ResonatorOptimizer | CustomOptimizer)[] = [],
    onEvent?: EventListener
  ): OptimizerSet {
    const set = new OptimizerSet(onEvent);
    set.add(optimizers);
    return set;
  },

  /**
   * Console progress reporter for optimizer and set events.
   */
  reporter(options?: ConsoleReporterOptions): EventListener {
    return createConsoleReporter(options);
  },

  percentScale(adjustStrength?: number): PercentScale {
    return new PercentScale(adjustStrength);
  },

  meshStep(): MeshStep {
    return new MeshStep();
  },

  linFit(): LinFit {
    return new LinFit();
  },

  polyFit(degree: number): PolyFit {
    return new PolyFit(degree);
  },

  crossingPointSplit(): CrossingPointSplit {
    return new CrossingPointSplit();
  },
};

// Default export
export default emtune;
