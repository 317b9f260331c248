export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Mean absolute difference between consecutive samples. */
export function jitter(samples: number[]): number {
  if (samples.length < 2) return 0;

  const differences: number[] = [];
  for (let i = 1; i < samples.length; i++) {
    differences.push(Math.abs(samples[i] - samples[i - 1]));
  }
  return mean(differences);
}
