import type { Strategy, StrategyInput } from '../types.js';
import { PERCENT_SCALE_ADJUST_STRENGTH } from '../constants.js';
import { roundToMesh } from '../library/mesh.js';
import { lastVariableValue } from './history.js';

/**
 * Step the last variable value towards the target by a fixed fraction of the
 * remaining output error: `next = last ± correlation * 0.002 * |current - target|`,
 * snapped to the mesh grid.
 *
 * Slow but always defined, so it bootstraps every search and backs up the
 * fit-based strategies.
 */
export class PercentScale implements Strategy {
  readonly name = 'PercentScale';

  constructor(private readonly adjustStrength = PERCENT_SCALE_ADJUST_STRENGTH) {}

  nextValue(input: StrategyInput): number {
    const { currentOutput, targetOutput, correlation, meshSize } = input;
    const last = lastVariableValue(input.variableValues, this.name);
    const step = this.adjustStrength * Math.abs(currentOutput - targetOutput);

    const next =
      currentOutput > targetOutput
        ? last - correlation * step
        : last + correlation * step;

    return roundToMesh(next, meshSize);
  }

  renderTrace(): void {
    // Nothing to draw: the proposal is not derived from a fit.
  }
}
