import { vi } from 'vitest';
import type {
  ArtifactGenerator,
  BatchAnalyzer,
  CacheStore,
  EventListener,
  GenerateArtifactRequest,
  OptimizerSettings,
} from '../../types.js';
import { OutputNotReadyError } from '../../errors.js';
import { LinFit } from '../../strategies/index.js';
import { CustomOptimizer } from '../custom-optimizer.js';
import { MemoryCacheStore } from '../cache.js';

export const BASE_BATCH = {
  artifactName: 'base',
  artifactPath: 'inputs',
  outputPath: 'outputs',
};

/**
 * In-process stand-in for the solver: artifacts get the variable value they
 * were generated with, and analysis returns `model(value)` once solved.
 */
export function createBench(options: {
  model?: (value: number) => number;
  initialValue?: number;
  autoSolve?: boolean;
  baseReady?: boolean;
} = {}) {
  const {
    model = (value: number) => 10 * value,
    initialValue = 100,
    autoSolve = true,
    baseReady = true,
  } = options;

  const values = new Map<string, number>([[BASE_BATCH.artifactName, initialValue]]);
  const solved = new Set<string>(baseReady ? [BASE_BATCH.artifactName] : []);

  const generate = vi.fn(async (request: GenerateArtifactRequest): Promise<void> => {
    values.set(request.outputName, request.substitutions['length']);
    if (autoSolve) {
      solved.add(request.outputName);
    }
  });

  const analyze = vi.fn(
    async (artifactName: string, outputPath: string, _quantity: string): Promise<number> => {
      const value = values.get(artifactName);
      if (value === undefined || !solved.has(artifactName)) {
        throw new OutputNotReadyError(artifactName, outputPath);
      }
      return model(value);
    }
  );

  const generator: ArtifactGenerator = { generate };
  const analyzer: BatchAnalyzer = { quantities: ['gain'], analyze };

  return {
    generator,
    analyzer,
    generate,
    analyze,
    /** Mark every generated artifact as simulated. */
    solve(): void {
      for (const name of values.keys()) {
        solved.add(name);
      }
    },
  };
}

export type Bench = ReturnType<typeof createBench>;

export function makeSettings(overrides: Partial<OptimizerSettings> = {}): OptimizerSettings {
  return {
    variableName: 'length',
    targetQuantity: 'gain',
    targetValue: 2000,
    tolerance: 0.01,
    correlation: '+',
    strategy: new LinFit(),
    ...overrides,
  };
}

export function createAmp(
  bench: Bench,
  options: {
    name?: string;
    settings?: Partial<OptimizerSettings>;
    cache?: CacheStore;
    onEvent?: EventListener;
    initialValue?: number;
  } = {}
): Promise<CustomOptimizer> {
  return CustomOptimizer.create({
    name: options.name ?? 'amp',
    settings: makeSettings(options.settings),
    generator: bench.generator,
    analyzer: bench.analyzer,
    cache: options.cache ?? new MemoryCacheStore(),
    onEvent: options.onEvent,
    firstBatch: BASE_BATCH,
    initialValue: options.initialValue ?? 100,
  });
}
