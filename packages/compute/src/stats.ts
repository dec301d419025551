// Order-sensitive float helpers. Callers that need exact equality between
// two totals must feed them the same values in the same order.

export function sum(xs: readonly number[]): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}

export function mean(xs: readonly number[]): number {
  return sum(xs) / xs.length;
}

export function sortAscending(xs: readonly number[]): number[] {
  return [...xs].sort((a, b) => a - b);
}

/** Standard median: mean of the two middle values for even counts. */
export function median(sorted: readonly number[]): number {
  const n = sorted.length;
  const mid = Math.floor(n / 2);
  return n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Linear interpolation between closest ranks, position (n - 1) * p. */
export function quantile(sorted: readonly number[], p: number): number {
  const pos = (sorted.length - 1) * p;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export type HistogramBucket = {
  index: number;
  lower: number;
  upper: number; // inclusive for the last bucket only
  count: number;
};

/**
 * Fixed-width histogram over [min, max]. A value equal to max lands in the
 * last bucket. A zero-width range yields one bucket holding every value.
 */
export function histogram(values: readonly number[], bucketCount: number): HistogramBucket[] {
  if (!Number.isInteger(bucketCount) || bucketCount < 1) {
    throw new RangeError(`bucket count must be a whole number >= 1 (got ${bucketCount})`);
  }
  if (values.length === 0) return [];

  const sorted = sortAscending(values);
  const min = sorted[0];
  const max = sorted[sorted.length - 1];

  if (min === max) return [{ index: 0, lower: min, upper: max, count: values.length }];

  const width = (max - min) / bucketCount;
  const buckets: HistogramBucket[] = [];
  for (let i = 0; i < bucketCount; i++) {
    buckets.push({
      index: i,
      lower: min + i * width,
      upper: i === bucketCount - 1 ? max : min + (i + 1) * width,
      count: 0,
    });
  }

  for (const v of values) {
    const i = Math.min(bucketCount - 1, Math.floor((v - min) / width));
    buckets[i].count += 1;
  }

  return buckets;
}
