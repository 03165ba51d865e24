/** Upper bounds in ms; the last bucket is everything above 30s. */
export const DURATION_BUCKETS_MS = [100, 500, 1000, 5000, 30_000] as const;

export interface HistogramBucket {
  /** Inclusive upper bound; null for +inf */
  le: number | null;
  count: number;
}

export function bucketDurations(durations: number[]): HistogramBucket[] {
  const buckets: HistogramBucket[] = [
    ...DURATION_BUCKETS_MS.map((le) => ({ le, count: 0 })),
    { le: null, count: 0 },
  ];
  for (const ms of durations) {
    const index = DURATION_BUCKETS_MS.findIndex((le) => ms <= le);
    buckets[index === -1 ? buckets.length - 1 : index].count += 1;
  }
  return buckets;
}
