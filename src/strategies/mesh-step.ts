import type { Strategy, StrategyInput } from '../types.js';
import { lastVariableValue } from './history.js';

/**
 * Move the last variable value by exactly one mesh step towards the target.
 */
export class MeshStep implements Strategy {
  readonly name = 'MeshStep';

  nextValue(input: StrategyInput): number {
    const { currentOutput, targetOutput, correlation, meshSize } = input;
    const last = lastVariableValue(input.variableValues, this.name);

    return currentOutput > targetOutput
      ? last - correlation * meshSize
      : last + correlation * meshSize;
  }

  renderTrace(): void {}
}
