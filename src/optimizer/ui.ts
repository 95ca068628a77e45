/**
 * UI utilities for console output
 */
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import figures from 'figures';

// ═══════════════════════════════════════════════════════════════════════════
// THEME
// ═══════════════════════════════════════════════════════════════════════════

export const theme = {
  // Status colors
  success: chalk.green,
  warning: chalk.yellow,

  // Text styling
  bold: chalk.bold,
  dim: chalk.dim,

  // Symbols (cross-platform via figures)
  check: chalk.green(figures.tick),
  cross: chalk.red(figures.cross),
  warn: chalk.yellow(figures.warning),
  bullet: chalk.dim(figures.bullet),
  pointer: chalk.yellow(figures.pointer),
  arrow: chalk.cyan(figures.arrowRight),

  // Formatting helpers
  separator: chalk.dim(' · '),
  divider: (label: string, width = 60) => {
    const prefix = `━━━ ${label} `;
    const remaining = Math.max(0, width - prefix.length);
    return chalk.cyan.dim(prefix + '━'.repeat(remaining));
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// SPINNER MANAGER
// ═══════════════════════════════════════════════════════════════════════════

let activeSpinner: Ora | null = null;

export const spinner = {
  start(text: string): Ora {
    if (activeSpinner) {
      activeSpinner.stop();
    }
    activeSpinner = ora({
      text,
      spinner: 'dots',
      indent: 4,
    }).start();
    return activeSpinner;
  },

  stop(): void {
    if (activeSpinner) {
      activeSpinner.stop();
      activeSpinner = null;
    }
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS BAR
// ═══════════════════════════════════════════════════════════════════════════

export interface ProgressTracker {
  start(total: number): void;
  update(current: number): void;
  stop(): void;
}

export function createProgressTracker(label: string): ProgressTracker {
  let bar: cliProgress.SingleBar | null = null;
  let startTime = 0;

  return {
    start(total: number) {
      spinner.stop();

      startTime = Date.now();
      bar = new cliProgress.SingleBar({
        format: `    {bar} {value}/{total} ${label}  {duration_formatted}`,
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 20,
        hideCursor: true,
        clearOnComplete: true,
        stopOnComplete: false,
        fps: 10,
      });
      bar.start(total, 0, { duration_formatted: '0s' });
    },

    update(current: number) {
      if (bar) {
        const elapsed = Math.round((Date.now() - startTime) / 1000);
        bar.update(current, { duration_formatted: `${elapsed}s` });
      }
    },

    stop() {
      if (bar) {
        bar.stop();
        bar = null;
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

const SI_PREFIXES: Record<number, string> = {
  24: 'Y',
  21: 'Z',
  18: 'E',
  15: 'P',
  12: 'T',
  9: 'G',
  6: 'M',
  3: 'k',
  0: '',
  [-3]: 'm',
  [-6]: 'µ',
  [-9]: 'n',
  [-12]: 'p',
  [-15]: 'f',
  [-18]: 'a',
  [-21]: 'z',
  [-24]: 'y',
};

/**
 * Format a value with an SI prefix, e.g. `formatSI(2.0e9, 'Hz')` → `2.00 GHz`.
 * Values outside the prefix table fall back to exponent notation.
 */
export function formatSI(value: number, unit = '', digits = 2): string {
  const spacer = unit ? ' ' : '';
  if (value === 0 || !Number.isFinite(value)) {
    return `${value.toFixed(digits)}${spacer}${unit}`;
  }

  const exponent = Math.floor(Math.log10(Math.abs(value)) / 3) * 3;
  const prefix = SI_PREFIXES[exponent];
  if (prefix === undefined) {
    return `${value.toExponential(digits)}${spacer}${unit}`;
  }

  const scaled = value / 10 ** exponent;
  const separator = prefix || unit ? ' ' : '';
  return `${scaled.toFixed(digits)}${separator}${prefix}${unit}`;
}

/** Drop floating-point noise left by mesh snapping, e.g. 100.30000000000001 → 100.3 */
export function formatValue(value: number): string {
  return String(Number(value.toPrecision(12)));
}

export function formatPercentage(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
