import type { Correlation, OptimizerSettings, Strategy } from '../types.js';
import { DEFAULT_MESH_SIZE, SIMULATION_FILE_EXTENSION } from '../constants.js';
import { ConfigurationError } from '../errors.js';

/**
 * Settings after validation, with defaults filled in and the correlation
 * turned into a sign.
 */
export interface ResolvedSettings {
  variableName: string;
  targetQuantity: string;
  targetValue: number;
  tolerance: number;
  correlation: Correlation;
  strategy: Strategy;
  meshSize: number;
  minValue?: number;
  maxValue?: number;
  artifactFolderPattern?: string;
  outputFolderPattern?: string;
}

const ACCEPTED_CORRELATIONS = ['+', '-'];

export function resolveSettings(settings: OptimizerSettings): ResolvedSettings {
  if (!settings.variableName) {
    throw new ConfigurationError('variableName is required');
  }
  if (!ACCEPTED_CORRELATIONS.includes(settings.correlation)) {
    throw new ConfigurationError(
      `Cannot correlate with '${settings.correlation}'. Can only use ${ACCEPTED_CORRELATIONS.join(', ')}`
    );
  }
  if (!Number.isFinite(settings.targetValue)) {
    throw new ConfigurationError('targetValue must be a finite number');
  }
  if (!Number.isFinite(settings.tolerance) || settings.tolerance < 0) {
    throw new ConfigurationError('tolerance must be a non-negative number');
  }

  const meshSize = settings.meshSize ?? DEFAULT_MESH_SIZE;
  if (!Number.isFinite(meshSize) || meshSize <= 0) {
    throw new ConfigurationError('meshSize must be a positive number');
  }

  checkBound('minValue', settings.minValue);
  checkBound('maxValue', settings.maxValue);
  if (
    settings.minValue !== undefined &&
    settings.maxValue !== undefined &&
    settings.minValue > settings.maxValue
  ) {
    throw new ConfigurationError(
      `minValue (${settings.minValue}) must not exceed maxValue (${settings.maxValue})`
    );
  }

  if (!isStrategy(settings.strategy)) {
    throw new ConfigurationError('strategy must implement nextValue() and renderTrace()');
  }

  return {
    ...settings,
    correlation: settings.correlation === '+' ? 1 : -1,
    meshSize,
  };
}

/** Optimizer names become cache file names, so they cannot hold a path. */
export function checkOptimizerName(name: string): void {
  if (!name) {
    throw new ConfigurationError('An optimizer needs a unique name');
  }
  if (/[\\/]/.test(name)) {
    throw new ConfigurationError(
      `Optimizer name '${name}' must not contain a path separator`
    );
  }
}

export function checkArtifactName(artifactName: string): void {
  if (!artifactName) {
    throw new ConfigurationError('The first batch needs an artifact name');
  }
  if (artifactName.endsWith(SIMULATION_FILE_EXTENSION)) {
    throw new ConfigurationError(
      `Artifact name '${artifactName}' should not include the '${SIMULATION_FILE_EXTENSION}' extension`
    );
  }
}

function checkBound(label: string, value: number | undefined): void {
  if (value !== undefined && (typeof value !== 'number' || !Number.isFinite(value))) {
    throw new ConfigurationError(`${label} must be a finite number when set, got ${String(value)}`);
  }
}

export function isStrategy(value: unknown): value is Strategy {
  return (
    typeof value === 'object' &&
    value !== null &&
    'nextValue' in value &&
    typeof value.nextValue === 'function' &&
    'renderTrace' in value &&
    typeof value.renderTrace === 'function'
  );
}
