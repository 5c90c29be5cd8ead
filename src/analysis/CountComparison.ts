import { performance } from 'perf_hooks';
import { CardinalityEstimator } from '../sketch/cardinality';

export interface CountResult {
  readonly method: string;
  readonly uniqueCount: number;
  readonly elapsedMs: number;
}

export interface ComparisonReport {
  readonly exact: CountResult;
  readonly approximate: CountResult;
  readonly relativeError: number;
}

export function countUniqueExact(values: Iterable<string>): number {
  return new Set(values).size;
}

export function countUniqueApproximate(values: Iterable<string>, bucketBits: number): number {
  const estimator = new CardinalityEstimator({ bucketBits });
  for (const value of values) {
    estimator.add(value);
  }
  return estimator.estimate();
}

function timed(method: string, count: () => number): CountResult {
  const start = performance.now();
  const uniqueCount = count();
  return { method, uniqueCount, elapsedMs: performance.now() - start };
}

/**
 * Count distinct values exactly and with HyperLogLog, timing each.
 * relativeError is |approximate - exact| / exact; with no values at all it
 * falls back to the approximate count.
 */
export function compareCounts(values: readonly string[], bucketBits: number): ComparisonReport {
  const exact = timed('Exact count', () => countUniqueExact(values));
  const approximate = timed('HyperLogLog', () => countUniqueApproximate(values, bucketBits));

  const relativeError = exact.uniqueCount === 0
    ? approximate.uniqueCount
    : Math.abs(approximate.uniqueCount - exact.uniqueCount) / exact.uniqueCount;

  return { exact, approximate, relativeError };
}

/**
 * Render a report as a fixed-width text table.
 */
export function formatComparison(report: ComparisonReport): string {
  const header = ['Method', 'Unique elements', 'Time (ms)'];
  const rows = [report.exact, report.approximate].map((result) => [
    result.method,
    result.uniqueCount.toFixed(result.uniqueCount % 1 === 0 ? 0 : 2),
    result.elapsedMs.toFixed(3),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();

  return [render(header), ...rows.map(render)].join('\n');
}
