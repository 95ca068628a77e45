/**
 * Last variable value of a history, which every strategy steps from.
 */
export function lastVariableValue(variableValues: readonly number[], strategy: string): number {
  if (variableValues.length === 0) {
    throw new Error(`${strategy} needs at least one analyzed batch to propose a value`);
  }
  return variableValues[variableValues.length - 1];
}

export function alreadyTried(variableValues: readonly number[], value: number): boolean {
  return variableValues.includes(value);
}
