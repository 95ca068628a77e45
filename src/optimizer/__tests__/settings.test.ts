import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors.js';
import { checkArtifactName, isStrategy, resolveSettings } from '../settings.js';
import { makeSettings } from './fixtures.js';

describe('resolveSettings', () => {
  it('fills in the mesh size and turns the correlation into a sign', () => {
    const resolved = resolveSettings(makeSettings({ correlation: '-' }));

    expect(resolved.meshSize).toBe(1);
    expect(resolved.correlation).toBe(-1);
    expect(resolveSettings(makeSettings()).correlation).toBe(1);
  });

  it('keeps a custom mesh size', () => {
    expect(resolveSettings(makeSettings({ meshSize: 0.5 })).meshSize).toBe(0.5);
  });

  it('rejects a missing variable name', () => {
    expect(() => resolveSettings(makeSettings({ variableName: '' }))).toThrow(
      'variableName is required'
    );
  });

  it('rejects a negative tolerance', () => {
    expect(() => resolveSettings(makeSettings({ tolerance: -0.1 }))).toThrow(ConfigurationError);
  });

  it('rejects a non-positive mesh size', () => {
    expect(() => resolveSettings(makeSettings({ meshSize: 0 }))).toThrow(
      'meshSize must be a positive number'
    );
  });

  it('rejects a non-finite target', () => {
    expect(() => resolveSettings(makeSettings({ targetValue: Number.NaN }))).toThrow(
      'targetValue must be a finite number'
    );
  });

  it('rejects crossed bounds', () => {
    expect(() => resolveSettings(makeSettings({ minValue: 500, maxValue: 400 }))).toThrow(
      'minValue (500) must not exceed maxValue (400)'
    );
  });

  it('rejects a non-finite bound', () => {
    expect(() => resolveSettings(makeSettings({ maxValue: Number.POSITIVE_INFINITY }))).toThrow(
      'maxValue must be a finite number when set, got Infinity'
    );
  });
});

describe('checkArtifactName', () => {
  it('rejects names with the simulation file extension', () => {
    expect(() => checkArtifactName('res_v1.son')).toThrow(
      "Artifact name 'res_v1.son' should not include the '.son' extension"
    );
  });

  it('rejects an empty name', () => {
    expect(() => checkArtifactName('')).toThrow(ConfigurationError);
  });

  it('accepts a bare name', () => {
    expect(() => checkArtifactName('res_v1')).not.toThrow();
  });
});

describe('isStrategy', () => {
  it('accepts objects with nextValue and renderTrace', () => {
    expect(isStrategy({ name: 'Fixed', nextValue: () => 1, renderTrace: () => {} })).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isStrategy(null)).toBe(false);
    expect(isStrategy({ nextValue: () => 1 })).toBe(false);
    expect(isStrategy('LinFit')).toBe(false);
  });
});
