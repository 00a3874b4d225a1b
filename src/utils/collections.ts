export function uniqueStrings(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

export function countBy<T, K extends string>(
  items: Iterable<T>,
  keyOf: (item: T) => K,
  initial: Record<K, number>,
): Record<K, number> {
  const counts = { ...initial };
  for (const item of items) {
    const key = keyOf(item);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}
