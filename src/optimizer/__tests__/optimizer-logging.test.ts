import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import figures from 'figures';
import {
  buildOptimizerReport,
  createConsoleReporter,
  formatEvent,
  summarizeOptimizer,
  writeOptimizerReport,
} from '../optimizer-logging.js';
import { formatSI, formatValue } from '../ui.js';
import { createAmp, createBench } from './fixtures.js';
import type { CustomOptimizer } from '../custom-optimizer.js';

const ANSI = /\u001b\[[0-9;]*m/g;

function strip(text: string): string {
  return text.replace(ANSI, '');
}

async function convergedAmp(): Promise<CustomOptimizer> {
  const amp = await createAmp(createBench());
  for (let i = 0; i < 10; i++) {
    await amp.analyzeBatch();
    const outcome = await amp.generateNextBatch();
    if (!outcome.generated) break;
  }
  return amp;
}

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => strip(String(call[0])));
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  // Spinner and progress line output
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatSI', () => {
  it('picks the matching prefix', () => {
    expect(formatSI(2.1e9, 'Hz')).toBe('2.10 GHz');
    expect(formatSI(2.0e5, 'Hz')).toBe('200.00 kHz');
    expect(formatSI(0.0035, 'F', 1)).toBe('3.5 mF');
    expect(formatSI(20, 'dB')).toBe('20.00 dB');
  });

  it('leaves out the separator without prefix or unit', () => {
    expect(formatSI(20)).toBe('20.00');
    expect(formatSI(2000)).toBe('2.00 k');
  });

  it('formats zero without a prefix', () => {
    expect(formatSI(0, 'Hz')).toBe('0.00 Hz');
  });
});

describe('formatValue', () => {
  it('drops floating-point noise', () => {
    expect(formatValue(0.1 + 0.2)).toBe('0.3');
    expect(formatValue(412)).toBe('412');
  });
});

describe('formatEvent', () => {
  it('formats an analyzed batch with its unit', () => {
    const line = formatEvent({
      type: 'batch-analyzed',
      optimizer: 'res_a',
      batchNo: 2,
      variableValue: 402,
      outputValue: 2.1e9,
      quantity: 'f0',
    });

    expect(strip(line ?? '')).toBe(
      `    ${figures.tick} res_a batch 2 · 402 ${figures.arrowRight} f0 = 2.10 GHz`
    );
  });

  it('formats a clamped proposal', () => {
    const line = formatEvent({
      type: 'clamped',
      optimizer: 'amp',
      batchNo: 2,
      proposed: 102,
      clampedTo: 101,
      bound: 'max',
      strategy: 'LinFit',
    });

    expect(strip(line ?? '')).toBe(
      `    ${figures.warning} amp batch 2 · LinFit proposed 102, clamped to max 101`
    );
  });

  it('formats convergence', () => {
    const line = formatEvent({
      type: 'converged',
      optimizer: 'amp',
      batchNo: 5,
      variableValue: 200,
      outputValue: 2000,
      quantity: 'gain',
      variableName: 'length',
    });

    expect(strip(line ?? '')).toBe(
      `    ${figures.tick} amp converged at batch 5: length = 200 gives gain = 2.00 k`
    );
  });

  it('formats a strategy fallback', () => {
    const line = formatEvent({
      type: 'strategy-fallback',
      optimizer: 'amp',
      batchNo: 6,
      from: 'LinFit',
      to: 'PercentScale',
    });

    expect(strip(line ?? '')).toBe(
      `    ${figures.warning} amp batch 6 · LinFit fell back to PercentScale`
    );
  });

  it('has no line for progress-only events', () => {
    expect(formatEvent({ type: 'analysis-start', optimizer: 'amp', batchNo: 1 })).toBeNull();
    expect(formatEvent({ type: 'round-start', round: 1, active: ['amp'] })).toBeNull();
  });
});

describe('createConsoleReporter', () => {
  it('prints events immediately outside a round', () => {
    const report = createConsoleReporter({ units: { gain: 'dB' } });

    report({ type: 'analysis-start', optimizer: 'amp', batchNo: 1 });
    expect(console.log).not.toHaveBeenCalled();

    report({
      type: 'batch-analyzed',
      optimizer: 'amp',
      batchNo: 1,
      variableValue: 100,
      outputValue: 20,
      quantity: 'gain',
    });

    expect(logged()).toEqual([
      `    ${figures.tick} amp batch 1 · 100 ${figures.arrowRight} gain = 20.00 dB`,
    ]);
  });

  it('holds a round until it completes', () => {
    const report = createConsoleReporter();

    report({ type: 'round-start', round: 1, active: ['amp'] });
    report({
      type: 'batch-generated',
      optimizer: 'amp',
      batchNo: 2,
      value: 102,
      artifactName: 'batch_2__amp_length_102',
    });

    expect(logged()).toHaveLength(2);
    expect(logged()[0]).toBe('');
    expect(logged()[1]).toContain('━━━ Round 1 ━');

    report({ type: 'round-complete', round: 1, active: ['amp'] });

    expect(logged()[2]).toBe(
      `    ${figures.arrowRight} amp batch 2 · batch_2__amp_length_102`
    );
    expect(logged()).toHaveLength(3);
  });

  it('notes when no optimizer is left to advance', () => {
    const report = createConsoleReporter();

    report({ type: 'round-start', round: 4, active: ['amp'] });
    report({ type: 'optimizer-finished', optimizer: 'amp' });
    report({ type: 'round-complete', round: 4, active: [] });

    expect(logged().slice(2)).toEqual([
      `    ${figures.bullet} amp finished`,
      '    No optimizer left to advance',
    ]);
  });
});

describe('summarizeOptimizer', () => {
  it('summarizes a converged search', async () => {
    const amp = await convergedAmp();

    expect(strip(summarizeOptimizer(amp))).toBe(
      `${figures.tick} amp · length = 200 gives 2.00 k · target gain 2.00 k ±1.0%`
    );
  });

  it('summarizes a search still under way', async () => {
    const amp = await createAmp(createBench());

    expect(strip(summarizeOptimizer(amp))).toBe(
      `${figures.cross} amp · length = 100 gives 1.00 k · target gain 2.00 k ±1.0%`
    );
  });

  it('summarizes a search with nothing analyzed', async () => {
    const amp = await createAmp(createBench({ baseReady: false }));

    expect(strip(summarizeOptimizer(amp))).toBe(
      `${figures.bullet} amp · no batches analyzed · target gain 2.00 k ±1.0%`
    );
  });
});

describe('buildOptimizerReport', () => {
  it('includes the pending batch of a search under way', async () => {
    const amp = await createAmp(createBench());
    const report = buildOptimizerReport(amp);

    expect(report.pending).toEqual({ batchNo: 2, variableValue: 102 });
    expect(report.converged).toBe(false);
    expect(report.closest?.variableValue).toBe(100);
    expect(report.ledger).toHaveLength(2);
  });
});

describe('writeOptimizerReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'emtune-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes settings, history and plot series as JSON', async () => {
    const amp = await convergedAmp();
    const reportPath = join(dir, 'reports', 'amp.json');

    writeOptimizerReport(reportPath, amp);

    const report: unknown = JSON.parse(await readFile(reportPath, 'utf-8'));
    expect(report).toMatchObject({
      name: 'amp',
      strategy: 'LinFit',
      state: 'STOPPED',
      converged: true,
      pending: null,
      settings: {
        variableName: 'length',
        targetQuantity: 'gain',
        targetValue: 2000,
        tolerance: 0.01,
        correlation: '+',
        meshSize: 1,
        minValue: null,
        maxValue: null,
      },
      history: [
        { batchNo: 1, variableValue: 100, outputValue: 1000 },
        { batchNo: 2, variableValue: 102, outputValue: 1020 },
        { batchNo: 3, variableValue: 104, outputValue: 1040 },
        { batchNo: 4, variableValue: 106, outputValue: 1060 },
        { batchNo: 5, variableValue: 200, outputValue: 2000 },
      ],
      closest: { variableValue: 200, outputValue: 2000 },
      plot: [{ kind: 'scatter' }, { kind: 'horizontal-line', y: 2000 }, { kind: 'line', label: 'LinFit' }],
    });
    expect(logged()).toEqual([`  Report written to: ${reportPath}`]);
  });

  it('reports a failed write instead of throwing', async () => {
    const amp = await createAmp(createBench());
    await writeFile(join(dir, 'blocker'), 'not a directory', 'utf-8');

    expect(() => writeOptimizerReport(join(dir, 'blocker', 'amp.json'), amp)).not.toThrow();
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("Failed to write report for 'amp':")
    );
  });
});
