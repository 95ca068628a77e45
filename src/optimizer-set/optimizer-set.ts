import type { EventListener, SchedulerEvent, Strategy } from '../types.js';
import { SingleParamOptimizer, type BatchOverrides } from '../optimizer/optimizer.js';
import {
  ConfigurationError,
  OutputNotReadyError,
  SearchFinishedError,
} from '../errors.js';

/**
 * Per-optimizer overrides, keyed by optimizer name and then by the number of
 * the batch being generated.
 */
export interface IterBatchesOptions {
  overrideValues?: Record<string, BatchOverrides<number>>;
  ignoreStops?: Record<string, BatchOverrides<boolean>>;
  overrideStrategies?: Record<string, BatchOverrides<Strategy>>;
}

export type OptimizerOutcome = 'waiting' | 'finished';

export interface IterBatchesResult {
  rounds: number;
  /** Why each optimizer stopped being driven. */
  outcomes: Record<string, OptimizerOutcome>;
}

/**
 * A named collection of independent optimizers driven through synchronized
 * batch rounds.
 *
 * Each round analyzes and advances every optimizer that is still active. An
 * optimizer whose solver output is missing is paused until the next call; one
 * that has converged is finished. Any other error aborts the whole call.
 */
export class OptimizerSet implements Iterable<SingleParamOptimizer> {
  private readonly optimizers = new Map<string, SingleParamOptimizer>();

  constructor(private readonly onEvent?: EventListener) {}

  /**
   * Add one or more optimizers. Names must be unique; nothing is added when
   * any name clashes.
   */
  add(optimizer: SingleParamOptimizer | readonly SingleParamOptimizer[]): void {
    const incoming = optimizer instanceof SingleParamOptimizer ? [optimizer] : optimizer;
    const seen = new Set<string>();

    for (const opt of incoming) {
      if (this.optimizers.has(opt.name) || seen.has(opt.name)) {
        throw new ConfigurationError(
          `An optimizer named '${opt.name}' already exists in the set`
        );
      }
      seen.add(opt.name);
    }

    for (const opt of incoming) {
      this.optimizers.set(opt.name, opt);
    }
  }

  get names(): string[] {
    return [...this.optimizers.keys()];
  }

  get size(): number {
    return this.optimizers.size;
  }

  get(name: string): SingleParamOptimizer {
    const optimizer = this.optimizers.get(name);
    if (!optimizer) {
      throw new ConfigurationError(`No optimizer named '${name}' in the set`);
    }
    return optimizer;
  }

  [Symbol.iterator](): Iterator<SingleParamOptimizer> {
    return this.optimizers.values();
  }

  /**
   * Run rounds until every optimizer is waiting for output or finished.
   *
   * @throws ConfigurationError when an override names an unknown optimizer,
   *   before any round runs
   */
  async iterBatches(options: IterBatchesOptions = {}): Promise<IterBatchesResult> {
    this.checkOverrideKeys('overrideValues', options.overrideValues);
    this.checkOverrideKeys('ignoreStops', options.ignoreStops);
    this.checkOverrideKeys('overrideStrategies', options.overrideStrategies);

    const outcomes: Record<string, OptimizerOutcome> = {};
    const active = new Set(this.optimizers.keys());
    let rounds = 0;

    while (active.size > 0) {
      rounds++;
      this.emit({ type: 'round-start', round: rounds, active: [...active] });

      for (const name of [...active]) {
        const optimizer = this.get(name);
        const batchNo = optimizer.currentBatchNo;

        try {
          if (!optimizer.awaitingGeneration) {
            await optimizer.analyzeBatch();
          }
          await optimizer.generateNextBatch({
            overrideValues: options.overrideValues?.[name],
            ignoreStop: options.ignoreStops?.[name],
            overrideStrategies: options.overrideStrategies?.[name],
          });
        } catch (error) {
          if (error instanceof OutputNotReadyError) {
            active.delete(name);
            outcomes[name] = 'waiting';
            this.emit({ type: 'optimizer-waiting', optimizer: name, batchNo });
            continue;
          }
          if (error instanceof SearchFinishedError) {
            active.delete(name);
            outcomes[name] = 'finished';
            this.emit({ type: 'optimizer-finished', optimizer: name });
            continue;
          }
          throw error;
        }
      }

      this.emit({ type: 'round-complete', round: rounds, active: [...active] });
    }

    return { rounds, outcomes };
  }

  describe(): string {
    return ['OptimizerSet', ...this.names.map((name) => `  '${name}'`)].join('\n');
  }

  private checkOverrideKeys(label: string, overrides: Record<string, unknown> | undefined): void {
    if (!overrides) {
      return;
    }
    for (const key of Object.keys(overrides)) {
      if (!this.optimizers.has(key)) {
        throw new ConfigurationError(
          `${label} has key '${key}' which does not match any optimizer in this set`
        );
      }
    }
  }

  private emit(event: SchedulerEvent): void {
    this.onEvent?.(event);
  }
}
