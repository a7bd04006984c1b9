export const sum = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0);

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : sum(values) / values.length;

export const median = (values: readonly number[]): number => quantile(values, 0.5);

// sample standard deviation (n - 1)
export const standardDeviation = (values: readonly number[]): number => {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const variance =
    values.reduce((total, value) => total + (value - average) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
};

export const quantile = (values: readonly number[], q: number): number => {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) {
    return sorted[lower];
  }
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

export const pearson = (xs: readonly number[], ys: readonly number[]): number | null => {
  const length = Math.min(xs.length, ys.length);
  if (length < 3) {
    return null;
  }
  const meanX = mean(xs.slice(0, length));
  const meanY = mean(ys.slice(0, length));
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let index = 0; index < length; index += 1) {
    const dx = xs[index] - meanX;
    const dy = ys[index] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }
  if (varianceX === 0 || varianceY === 0) {
    return null;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
};

export const pairValues = (
  left: readonly (number | null)[],
  right: readonly (number | null)[]
): { xs: number[]; ys: number[] } => {
  const xs: number[] = [];
  const ys: number[] = [];
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const x = left[index];
    const y = right[index];
    if (x !== null && y !== null) {
      xs.push(x);
      ys.push(y);
    }
  }
  return { xs, ys };
};
