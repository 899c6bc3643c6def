/**
 * @file src/lib/sets.ts
 * @description Small set algebra helpers used by the metrics and word diff.
 */

export const intersectionSize = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number => {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let count = 0;
  for (const value of small) {
    if (large.has(value)) count++;
  }
  return count;
};

export const unionSize = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number =>
  a.size + b.size - intersectionSize(a, b);

export const intersection = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): T[] =>
  [...a].filter((value) => b.has(value));

export const difference = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): T[] =>
  [...a].filter((value) => !b.has(value));
