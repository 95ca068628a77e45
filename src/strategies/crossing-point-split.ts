import type { Strategy, StrategyInput, TraceCanvas, TracePoint } from '../types.js';
import { CROSSING_TRACE_POINTS, MIN_FIT_POINTS } from '../constants.js';
import { BracketNotFoundError } from '../errors.js';
import { roundToMesh } from '../library/mesh.js';
import { linspace } from '../library/polyfit.js';
import { PercentScale } from './percent-scale.js';

interface Bracket {
  above: TracePoint;
  below: TracePoint;
}

/**
 * Secant step across the target: take the point closest to the target on each
 * side (output above vs. at or below) and interpolate the variable linearly
 * between them, snapped to the mesh grid.
 *
 * Needs an actual bracket. With an empty side the search fails; there is no
 * fallback.
 */
export class CrossingPointSplit implements Strategy {
  readonly name = 'CrossingPointSplit';

  private readonly percentScale = new PercentScale();

  nextValue(input: StrategyInput): number {
    const { variableValues, outputValues, targetOutput, meshSize } = input;

    if (variableValues.length < MIN_FIT_POINTS) {
      return this.percentScale.nextValue(input);
    }

    const bracket = findBracket(variableValues, outputValues, targetOutput);
    if (!bracket) {
      throw new BracketNotFoundError(this.name, targetOutput);
    }

    return roundToMesh(interpolate(bracket, targetOutput), meshSize);
  }

  renderTrace(
    canvas: TraceCanvas,
    variableValues: readonly number[],
    outputValues: readonly number[],
    targetOutput: number
  ): void {
    const bracket = findBracket(variableValues, outputValues, targetOutput);
    if (!bracket) {
      return;
    }

    const ys = linspace(bracket.below.y, bracket.above.y, CROSSING_TRACE_POINTS);
    canvas.line(
      ys.map((y) => interpolate(bracket, y)),
      ys,
      this.name
    );
  }
}

function findBracket(
  variableValues: readonly number[],
  outputValues: readonly number[],
  targetOutput: number
): Bracket | undefined {
  let above: TracePoint | undefined;
  let below: TracePoint | undefined;

  for (let i = 0; i < variableValues.length; i++) {
    const point = { x: variableValues[i], y: outputValues[i] };
    if (point.y > targetOutput) {
      if (!above || point.y < above.y) above = point;
    } else if (!below || point.y > below.y) {
      below = point;
    }
  }

  return above && below ? { above, below } : undefined;
}

// above.y > target >= below.y, so the slope denominator is never zero.
function interpolate({ above, below }: Bracket, y: number): number {
  return below.x + ((y - below.y) * (above.x - below.x)) / (above.y - below.y);
}
