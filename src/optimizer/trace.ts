import type { TraceCanvas, TracePoint } from '../types.js';

export type TraceSeries =
  | { kind: 'line'; xs: number[]; ys: number[]; label?: string }
  | { kind: 'scatter'; points: TracePoint[]; marker: 'dot' | 'cross'; label?: string }
  | { kind: 'horizontal-line'; y: number; label?: string };

/**
 * Canvas that records what was drawn as plain data, for reports or for an
 * external plotting tool.
 */
export class SeriesCanvas implements TraceCanvas {
  readonly series: TraceSeries[] = [];

  line(xs: readonly number[], ys: readonly number[], label?: string): void {
    this.series.push({ kind: 'line', xs: [...xs], ys: [...ys], label });
  }

  scatter(
    points: readonly TracePoint[],
    options: { marker?: 'dot' | 'cross'; label?: string } = {}
  ): void {
    this.series.push({
      kind: 'scatter',
      points: points.map((point) => ({ ...point })),
      marker: options.marker ?? 'dot',
      label: options.label,
    });
  }

  horizontalLine(y: number, label?: string): void {
    this.series.push({ kind: 'horizontal-line', y, label });
  }
}
