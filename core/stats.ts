export interface RunningStats {
  count: number;
  mean: number;
  m2: number;
}

export function createRunningStats(): RunningStats {
  return { count: 0, mean: 0, m2: 0 };
}

// Welford's online update
export function push(stats: RunningStats, value: number) {
  stats.count += 1;
  const delta = value - stats.mean;
  stats.mean += delta / stats.count;
  const delta2 = value - stats.mean;
  stats.m2 += delta * delta2;
}

/** Chan et al. pairwise combination, for runs produced independently. */
export function combine(a: RunningStats, b: RunningStats): RunningStats {
  const count = a.count + b.count;
  if (count === 0) return createRunningStats();
  const delta = b.mean - a.mean;
  const mean = a.mean + (delta * b.count) / count;
  const m2 = a.m2 + b.m2 + (delta * delta * a.count * b.count) / count;
  return { count, mean, m2 };
}

export function variance(stats: RunningStats): number {
  if (stats.count < 2) return 0;
  return stats.m2 / (stats.count - 1);
}

export function stdev(stats: RunningStats): number {
  return Math.sqrt(variance(stats));
}

export function confidenceInterval(mean: number, stdev: number, samples: number, z = 1.96): [number, number] {
  if (samples === 0) return [mean, mean];
  const margin = (stdev / Math.sqrt(samples)) * z;
  return [mean - margin, mean + margin];
}
