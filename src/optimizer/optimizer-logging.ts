import type { Batch, EmtuneEvent, EventListener } from '../types.js';
import type { BatchResult, SingleParamOptimizer } from './optimizer.js';
import type { TraceSeries } from './trace.js';
import * as fs from 'fs';
import * as path from 'path';
import { SeriesCanvas } from './trace.js';
import {
  theme,
  spinner,
  createProgressTracker,
  formatPercentage,
  formatSI,
  formatValue,
} from './ui.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ConsoleReporterOptions {
  /** Unit printed after each measured quantity, keyed by quantity name. */
  units?: Record<string, string>;
}

const DEFAULT_UNITS: Record<string, string> = {
  f0: 'Hz',
  three_dB_BW: 'Hz',
};

/** Settings section of the JSON report */
interface ReportSettings {
  variableName: string;
  targetQuantity: string;
  targetValue: number;
  tolerance: number;
  correlation: '+' | '-';
  meshSize: number;
  minValue: number | null;
  maxValue: number | null;
}

/** One analyzed batch in the JSON report */
interface ReportHistoryEntry {
  batchNo: number;
  variableValue: number;
  outputValue: number;
}

/** Full JSON report structure */
interface OptimizerReport {
  generatedAt: string;
  name: string;
  strategy: string;
  state: string;
  settings: ReportSettings;
  history: ReportHistoryEntry[];
  ledger: Batch[];
  pending: { batchNo: number; variableValue: number } | null;
  converged: boolean;
  closest: BatchResult | null;
  plot: TraceSeries[];
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSOLE LOGGING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Clear any active progress line before logging
 */
export function clearProgressLine(): void {
  const width = process.stdout.columns || 80;
  process.stdout.write('\r' + ' '.repeat(width) + '\r');
}

function print(line: string): void {
  spinner.stop();
  clearProgressLine();
  console.log(line);
}

/**
 * Format one event as a console line, or `null` for events that only drive
 * the spinner and progress bar.
 */
export function formatEvent(
  event: EmtuneEvent,
  units: Record<string, string> = DEFAULT_UNITS
): string | null {
  switch (event.type) {
    case 'batch-analyzed':
      return `    ${theme.check} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${formatValue(event.variableValue)} ${theme.arrow} ${event.quantity} = ${formatSI(event.outputValue, units[event.quantity] ?? '')}`;

    case 'output-not-ready':
      return `    ${theme.bullet} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.dim('waiting for solver output')}`;

    case 'converged':
      return `    ${theme.check} ${theme.success(`${event.optimizer} converged`)} ${theme.dim(`at batch ${event.batchNo}: ${event.variableName} = ${formatValue(event.variableValue)} gives ${event.quantity} = ${formatSI(event.outputValue, units[event.quantity] ?? '')}`)}`;

    case 'stop-ignored':
      return `    ${theme.warn} ${theme.warning(`${event.optimizer} continues past convergence`)} ${theme.dim(`(batch ${event.batchNo})`)}`;

    case 'strategy-override':
      return `    ${theme.pointer} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.warning(`strategy set to ${event.strategy}`)}`;

    case 'value-override':
      return `    ${theme.pointer} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.warning(`value overridden to ${formatValue(event.value)}`)}`;

    case 'strategy-fallback':
      return `    ${theme.warn} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.warning(`${event.from} fell back to ${event.to}`)}`;

    case 'clamped':
      return `    ${theme.warn} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.warning(`${event.strategy} proposed ${formatValue(event.proposed)}, clamped to ${event.bound} ${formatValue(event.clampedTo)}`)}`;

    case 'batch-generated':
      return `    ${theme.arrow} ${theme.bold(event.optimizer)} batch ${event.batchNo}${theme.separator}${theme.dim(event.artifactName)}`;

    case 'optimizer-finished':
      return `    ${theme.bullet} ${theme.dim(`${event.optimizer} finished`)}`;

    case 'analysis-start':
    case 'optimizer-waiting':
    case 'round-start':
    case 'round-complete':
      return null;
  }
}

/**
 * Event listener that prints optimizer progress to the console.
 *
 * During an `OptimizerSet` round a progress bar tracks the optimizers still
 * to report, and the round's lines are printed once it completes. A lone
 * optimizer shows a spinner while a batch is being analyzed.
 *
 * @example
 * ```ts
 * const set = new OptimizerSet(createConsoleReporter());
 * ```
 */
export function createConsoleReporter(options: ConsoleReporterOptions = {}): EventListener {
  const units = { ...DEFAULT_UNITS, ...options.units };
  const tracker = createProgressTracker('optimizers');
  const buffered: string[] = [];
  const reported = new Set<string>();
  let inRound = false;

  const markReported = (optimizer: string): void => {
    reported.add(optimizer);
    tracker.update(reported.size);
  };

  return (event) => {
    switch (event.type) {
      case 'round-start':
        print('');
        print(theme.divider(`Round ${event.round}`));
        reported.clear();
        buffered.length = 0;
        inRound = true;
        tracker.start(event.active.length);
        return;

      case 'round-complete':
        tracker.stop();
        inRound = false;
        for (const line of buffered.splice(0)) {
          print(line);
        }
        if (event.active.length === 0) {
          print(`    ${theme.dim('No optimizer left to advance')}`);
        }
        return;

      case 'analysis-start':
        if (!inRound) {
          spinner.start(`Analyzing ${event.optimizer} batch ${event.batchNo}...`);
        }
        return;

      case 'batch-generated':
      case 'converged':
      case 'optimizer-waiting':
      case 'optimizer-finished':
        if (inRound) {
          markReported(event.optimizer);
        }
        break;
    }

    const line = formatEvent(event, units);
    if (line === null) {
      return;
    }
    if (inRound) {
      buffered.push(line);
    } else {
      print(line);
    }
  };
}

/**
 * One-line summary of where an optimizer stands, e.g. for printing after a
 * round of `iterBatches`.
 */
export function summarizeOptimizer(
  optimizer: SingleParamOptimizer,
  units: Record<string, string> = DEFAULT_UNITS
): string {
  const { targetQuantity, targetValue, tolerance, variableName } = optimizer.settings;
  const unit = units[targetQuantity] ?? '';
  const target = `${targetQuantity} ${formatSI(targetValue, unit)} ±${formatPercentage(tolerance)}`;

  if (optimizer.history.variableValues.length === 0) {
    return `${theme.bullet} ${theme.bold(optimizer.name)}${theme.separator}${theme.dim(`no batches analyzed${theme.separator}target ${target}`)}`;
  }

  const best = optimizer.closest();
  const icon = optimizer.hasReachedOptimization() ? theme.check : theme.cross;
  return `${icon} ${theme.bold(optimizer.name)}${theme.separator}${variableName} = ${formatValue(best.variableValue)} gives ${formatSI(best.outputValue, unit)}${theme.separator}${theme.dim(`target ${target}`)}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE WRITERS
// ═══════════════════════════════════════════════════════════════════════════

export function buildOptimizerReport(optimizer: SingleParamOptimizer): OptimizerReport {
  const { settings } = optimizer;
  const { variableValues, outputValues } = optimizer.history;
  const canvas = new SeriesCanvas();
  optimizer.plot(canvas);

  const pendingGenerated = optimizer.batches.length > variableValues.length;

  return {
    generatedAt: new Date().toISOString(),
    name: optimizer.name,
    strategy: optimizer.strategy.name,
    state: optimizer.state,
    settings: {
      variableName: settings.variableName,
      targetQuantity: settings.targetQuantity,
      targetValue: settings.targetValue,
      tolerance: settings.tolerance,
      correlation: settings.correlation === 1 ? '+' : '-',
      meshSize: settings.meshSize,
      minValue: settings.minValue ?? null,
      maxValue: settings.maxValue ?? null,
    },
    history: variableValues.map((variableValue, i) => ({
      batchNo: i + 1,
      variableValue,
      outputValue: outputValues[i],
    })),
    ledger: optimizer.batches,
    pending: pendingGenerated
      ? { batchNo: optimizer.currentBatchNo, variableValue: optimizer.nextVariableValue }
      : null,
    converged: optimizer.hasReachedOptimization(),
    closest: variableValues.length > 0 ? optimizer.closest() : null,
    plot: canvas.series,
  };
}

/**
 * Write the optimizer's settings, history, ledger and plot series as JSON.
 * Failures are reported on the console, never thrown.
 */
export function writeOptimizerReport(reportPath: string, optimizer: SingleParamOptimizer): void {
  try {
    const dir = path.dirname(reportPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const report = buildOptimizerReport(optimizer);
    fs.writeFileSync(reportPath, JSON.stringify(report, null, 2), 'utf-8');
    print(`  ${theme.dim('Report written to:')} ${reportPath}`);
  } catch (error) {
    console.error(
      `Failed to write report for '${optimizer.name}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
