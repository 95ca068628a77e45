/**
 * Snap a value to the nearest multiple of the simulation mesh size.
 *
 * Half-way values round towards positive infinity. Applying this to a value
 * already on the grid returns it unchanged.
 */
export function roundToMesh(value: number, meshSize: number): number {
  return Math.round(value / meshSize) * meshSize;
}
