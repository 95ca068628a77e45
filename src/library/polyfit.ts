/**
 * Least-squares polynomial fitting.
 *
 * Abscissae are centred and scaled before solving the normal equations so
 * that fits over large outputs (GHz-range frequencies, say) stay well
 * conditioned.
 */

export interface Polynomial {
  degree: number;
  /** Coefficients in the scaled variable, lowest order first. */
  coefficients: number[];
  evaluate(x: number): number;
}

const SINGULAR_PIVOT = 1e-12;

/**
 * Fit `y = p(x)` with a polynomial of the given degree.
 *
 * @returns the fitted polynomial, or `undefined` when the system is singular
 *   (too few distinct abscissae for the requested degree).
 */
export function polyfit(
  xs: readonly number[],
  ys: readonly number[],
  degree: number
): Polynomial | undefined {
  if (xs.length !== ys.length) {
    throw new Error(
      `polyfit needs equal length inputs, got ${xs.length} and ${ys.length}`
    );
  }
  if (!Number.isInteger(degree) || degree < 0) {
    throw new Error(`polyfit degree must be a non-negative integer, got ${degree}`);
  }
  if (xs.length <= degree) {
    return undefined;
  }

  const mean = xs.reduce((sum, x) => sum + x, 0) / xs.length;
  const spread = Math.max(...xs.map((x) => Math.abs(x - mean)));
  const scale = spread > 0 ? spread : 1;
  const scaled = xs.map((x) => (x - mean) / scale);

  // Normal equations: (VᵀV) c = Vᵀy with V the Vandermonde matrix.
  const size = degree + 1;
  const matrix: number[][] = [];
  for (let row = 0; row < size; row++) {
    const line: number[] = [];
    for (let col = 0; col < size; col++) {
      line.push(scaled.reduce((sum, t) => sum + t ** (row + col), 0));
    }
    line.push(scaled.reduce((sum, t, i) => sum + t ** row * ys[i], 0));
    matrix.push(line);
  }

  const coefficients = solveAugmented(matrix);
  if (!coefficients) {
    return undefined;
  }

  return {
    degree,
    coefficients,
    evaluate(x: number): number {
      const t = (x - mean) / scale;
      let result = 0;
      for (let i = coefficients.length - 1; i >= 0; i--) {
        result = result * t + coefficients[i];
      }
      return result;
    },
  };
}

/** Evenly spaced samples from `start` to `stop` inclusive. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 1) {
    return [start];
  }
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => start + i * step);
}

// Gaussian elimination with partial pivoting on an n × (n+1) matrix.
function solveAugmented(matrix: number[][]): number[] | undefined {
  const n = matrix.length;
  const reference = Math.max(...matrix.map((row) => Math.abs(row[0])), 1);

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(matrix[row][col]) > Math.abs(matrix[pivotRow][col])) {
        pivotRow = row;
      }
    }
    if (Math.abs(matrix[pivotRow][col]) < SINGULAR_PIVOT * reference) {
      return undefined;
    }
    [matrix[col], matrix[pivotRow]] = [matrix[pivotRow], matrix[col]];

    for (let row = col + 1; row < n; row++) {
      const factor = matrix[row][col] / matrix[col][col];
      for (let k = col; k <= n; k++) {
        matrix[row][k] -= factor * matrix[col][k];
      }
    }
  }

  const solution = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = matrix[row][n];
    for (let k = row + 1; k < n; k++) {
      sum -= matrix[row][k] * solution[k];
    }
    solution[row] = sum / matrix[row][row];
  }
  return solution;
}
