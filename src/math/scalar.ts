const epsilon = 1e-6;

const isFuzzyEqual = (lhs: number, rhs: number): boolean =>
  Math.abs(lhs - rhs) < epsilon;

const isFuzzyZero = (value: number): boolean => Math.abs(value) < epsilon;

export { epsilon, isFuzzyEqual, isFuzzyZero };
