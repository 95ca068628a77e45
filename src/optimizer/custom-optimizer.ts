import type { BatchAnalyzer, Batch } from '../types.js';
import {
  SingleParamOptimizer,
  type CreateOptions,
  type OptimizerOptions,
  type OptimizerSeed,
} from './optimizer.js';

export interface CustomOptimizerOptions extends OptimizerOptions {
  analyzer: BatchAnalyzer;
}

/**
 * Optimizer for any quantity a caller-supplied `BatchAnalyzer` can measure.
 */
export class CustomOptimizer extends SingleParamOptimizer {
  private readonly analyzer: BatchAnalyzer;

  private constructor(options: CustomOptimizerOptions, seed: OptimizerSeed) {
    super(options, seed, options.analyzer.quantities);
    this.analyzer = options.analyzer;
  }

  static async create(options: CustomOptimizerOptions & CreateOptions): Promise<CustomOptimizer> {
    const optimizer = new CustomOptimizer(options, CustomOptimizer.freshSeed(options));
    await optimizer.start();
    return optimizer;
  }

  static async restore(options: CustomOptimizerOptions): Promise<CustomOptimizer> {
    const seed = await CustomOptimizer.cachedSeed(options);
    return new CustomOptimizer(options, seed);
  }

  protected measure(batch: Batch, quantity: string): Promise<number> {
    return this.analyzer.analyze(batch.artifactName, batch.outputPath, quantity);
  }
}
