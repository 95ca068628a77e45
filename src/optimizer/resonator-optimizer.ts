import type { Batch, ResonatorAnalyzer, ResonatorQuantity } from '../types.js';
import { RESONATOR_QUANTITIES } from '../constants.js';
import {
  SingleParamOptimizer,
  type CreateOptions,
  type OptimizerOptions,
  type OptimizerSeed,
} from './optimizer.js';

export interface ResonatorOptimizerOptions extends OptimizerOptions {
  analyzer: ResonatorAnalyzer;
}

/**
 * Optimizer for single-resonator S-parameter simulations. The target quantity
 * is one of the resonator figures: `QR`, `QC`, `QI`, `f0` or `three_dB_BW`.
 *
 * @example
 * ```ts
 * const optimizer = await ResonatorOptimizer.create({
 *   name: 'res_a',
 *   firstBatch: { artifactName: 'res_a_v1', artifactPath: 'batch_1', outputPath: 'batch_1' },
 *   initialValue: 400,
 *   settings: {
 *     variableName: 'length',
 *     targetQuantity: 'f0',
 *     targetValue: 2.0e9,
 *     tolerance: 0.01,
 *     correlation: '-',
 *     strategy: new LinFit(),
 *   },
 *   generator,
 *   analyzer,
 * });
 * ```
 */
export class ResonatorOptimizer extends SingleParamOptimizer {
  private readonly analyzer: ResonatorAnalyzer;

  private constructor(options: ResonatorOptimizerOptions, seed: OptimizerSeed) {
    super(options, seed, RESONATOR_QUANTITIES);
    this.analyzer = options.analyzer;
  }

  /**
   * Start a new search from an already simulated first batch. Runs the first
   * analyze + propose cycle before resolving.
   */
  static async create(
    options: ResonatorOptimizerOptions & CreateOptions
  ): Promise<ResonatorOptimizer> {
    const optimizer = new ResonatorOptimizer(options, ResonatorOptimizer.freshSeed(options));
    await optimizer.start();
    return optimizer;
  }

  /**
   * Resume a search from its cached state without re-analysing or
   * regenerating anything.
   */
  static async restore(options: ResonatorOptimizerOptions): Promise<ResonatorOptimizer> {
    const seed = await ResonatorOptimizer.cachedSeed(options);
    return new ResonatorOptimizer(options, seed);
  }

  protected async measure(batch: Batch, quantity: string): Promise<number> {
    const measurement = await this.analyzer.analyze(batch.artifactName, batch.outputPath);
    return measurement[toResonatorQuantity(quantity)];
  }
}

function toResonatorQuantity(quantity: string): ResonatorQuantity {
  const match = RESONATOR_QUANTITIES.find((candidate) => candidate === quantity);
  if (!match) {
    throw new Error(`Unknown resonator quantity '${quantity}'`);
  }
  return match;
}
