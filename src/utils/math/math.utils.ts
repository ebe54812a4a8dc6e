import { map, mean, sum } from 'lodash-es';

const valuesMinusMeanSquared = (values: readonly number[] = []) => {
  const average = mean(values);
  return map(values, val => Math.pow(val - average, 2));
};

/** Sample standard deviation (Bessel's correction), NaN below two values. */
export const sampleStdev = (vals: readonly number[] = []) => {
  if (vals.length < 2) return NaN;
  return Math.sqrt(sum(valuesMinusMeanSquared(vals)) / (vals.length - 1));
};

export const median = (values: readonly number[] = []): number => {
  if (!values.length) return NaN;

  // Sort ascending without mutating the caller’s array
  const vals = [...values].sort((a, b) => a - b);
  const middle = Math.floor(vals.length / 2);

  return vals.length % 2 ? vals[middle] : (vals[middle - 1] + vals[middle]) / 2;
};
