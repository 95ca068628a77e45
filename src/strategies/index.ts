import type { Strategy } from '../types.js';
import { CrossingPointSplit } from './crossing-point-split.js';
import { MeshStep } from './mesh-step.js';
import { PercentScale } from './percent-scale.js';
import { LinFit, PolyFit } from './poly-fit.js';

export { PercentScale, MeshStep, PolyFit, LinFit, CrossingPointSplit };

const POLY_FIT_NAME = /^PolyFit\((\d+)\)$/;

/**
 * Rebuild a built-in strategy from its `name`, as stored in the cache.
 * Returns `undefined` for names that are not built in.
 */
export function strategyFromName(name: string): Strategy | undefined {
  switch (name) {
    case 'PercentScale':
      return new PercentScale();
    case 'MeshStep':
      return new MeshStep();
    case 'LinFit':
      return new LinFit();
    case 'CrossingPointSplit':
      return new CrossingPointSplit();
  }

  const polyFit = POLY_FIT_NAME.exec(name);
  return polyFit ? new PolyFit(Number(polyFit[1])) : undefined;
}
