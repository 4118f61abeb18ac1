export const setsIntersect = <T>(
  a: ReadonlySet<T>,
  b: ReadonlySet<T>,
): boolean => {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const value of small) {
    if (large.has(value)) return true;
  }
  return false;
};

export const addAll = <T>(target: Set<T>, values: Iterable<T>): Set<T> => {
  for (const value of values) target.add(value);
  return target;
};
