export type HistogramBin = {
  start: number;
  end: number;
  count: number;
};

export const DEFAULT_HISTOGRAM_BINS = 20;

/**
 * Equal-width bins between the smallest and largest value. The last bin is
 * closed so the maximum lands in it; a constant sample yields a single bin.
 */
export const binValues = (
  values: readonly number[],
  binCount: number = DEFAULT_HISTOGRAM_BINS
): HistogramBin[] => {
  if (values.length === 0) {
    return [];
  }
  const min = values.reduce((lowest, value) => Math.min(lowest, value), values[0]);
  const max = values.reduce((highest, value) => Math.max(highest, value), values[0]);
  if (min === max) {
    return [{ start: min, end: max, count: values.length }];
  }

  const count = Math.max(1, Math.floor(binCount));
  const width = (max - min) / count;
  const bins: HistogramBin[] = Array.from({ length: count }, (_, index) => ({
    start: min + index * width,
    end: index === count - 1 ? max : min + (index + 1) * width,
    count: 0
  }));
  values.forEach((value) => {
    bins[Math.min(count - 1, Math.floor((value - min) / width))].count += 1;
  });
  return bins;
};
