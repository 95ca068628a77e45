import type { Strategy, StrategyInput, TraceCanvas } from '../types.js';
import { FIT_TRACE_POINTS, MIN_FIT_POINTS } from '../constants.js';
import { ConfigurationError, SearchExhaustedError } from '../errors.js';
import { roundToMesh } from '../library/mesh.js';
import { linspace, polyfit } from '../library/polyfit.js';
import { alreadyTried } from './history.js';
import { MeshStep } from './mesh-step.js';
import { PercentScale } from './percent-scale.js';

/**
 * Fit the variable as a polynomial of the output over the whole history and
 * evaluate the fit at the target output, snapped to the mesh grid.
 *
 * With fewer than four points the proposal comes from PercentScale. When the
 * fit lands on a value that was already simulated (or the fit is singular),
 * the proposal falls back to PercentScale, then to MeshStep. If every
 * candidate has been tried the search is exhausted.
 */
export class PolyFit implements Strategy {
  readonly name: string;
  readonly degree: number;

  private readonly percentScale = new PercentScale();
  private readonly meshStep = new MeshStep();

  constructor(degree: number, name?: string) {
    if (!Number.isInteger(degree) || degree < 1) {
      throw new ConfigurationError(
        `PolyFit degree must be a positive integer, got ${degree}`
      );
    }
    this.degree = degree;
    this.name = name ?? `PolyFit(${degree})`;
  }

  nextValue(input: StrategyInput): number {
    const { variableValues, outputValues, targetOutput, meshSize } = input;

    if (variableValues.length < MIN_FIT_POINTS) {
      return this.percentScale.nextValue(input);
    }

    const fit = polyfit(outputValues, variableValues, this.degree);
    const fitted = fit ? fit.evaluate(targetOutput) : Number.NaN;
    if (Number.isFinite(fitted)) {
      const candidate = roundToMesh(fitted, meshSize);
      if (!alreadyTried(variableValues, candidate)) {
        return candidate;
      }
    }

    input.onFallback?.(this.name, this.percentScale.name);
    const scaled = this.percentScale.nextValue(input);
    if (!alreadyTried(variableValues, scaled)) {
      return scaled;
    }

    input.onFallback?.(this.percentScale.name, this.meshStep.name);
    const stepped = this.meshStep.nextValue(input);
    if (!alreadyTried(variableValues, stepped)) {
      return stepped;
    }

    throw new SearchExhaustedError(this.name);
  }

  renderTrace(
    canvas: TraceCanvas,
    variableValues: readonly number[],
    outputValues: readonly number[]
  ): void {
    const fit = polyfit(outputValues, variableValues, this.degree);
    if (!fit) {
      return;
    }

    const ys = linspace(
      Math.min(...outputValues),
      Math.max(...outputValues),
      FIT_TRACE_POINTS
    );
    canvas.line(
      ys.map((y) => fit.evaluate(y)),
      ys,
      this.name
    );
  }
}

/**
 * Straight-line fit. Equivalent to `new PolyFit(1)`.
 */
export class LinFit extends PolyFit {
  constructor() {
    super(1, 'LinFit');
  }
}
