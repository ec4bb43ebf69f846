// yomikata/partitions - Ordered, contiguous partitions of a sequence

/**
 * Lazily yield every way to cut `items` into `groups` contiguous, non-empty
 * sub-lists, preserving order. Cut positions are enumerated leftmost first,
 * so for [a, b, c] into 2 groups the order is [[a], [b, c]], [[a, b], [c]].
 */
export function* orderedPartitions<T>(items: readonly T[], groups: number): Generator<T[][]> {
  const n = items.length;
  if (groups <= 0 || groups > n) return;

  if (groups === 1) {
    yield [items.slice()];
    return;
  }
  if (groups === n) {
    yield items.map((item) => [item]);
    return;
  }

  // cuts[i] is the start index of group i + 1
  const cuts: number[] = [];
  for (let i = 1; i < groups; i++) cuts.push(i);

  while (true) {
    const result: T[][] = [];
    let start = 0;
    for (const cut of cuts) {
      result.push(items.slice(start, cut));
      start = cut;
    }
    result.push(items.slice(start));
    yield result;

    // Advance to the next combination of cut points in lexicographic order
    let i = cuts.length - 1;
    while (i >= 0 && cuts[i] === n - (cuts.length - i)) i--;
    if (i < 0) return;
    cuts[i]++;
    for (let j = i + 1; j < cuts.length; j++) cuts[j] = cuts[j - 1] + 1;
  }
}

/**
 * Count of partitions `orderedPartitions` would yield: C(n - 1, groups - 1).
 */
export function countPartitions(length: number, groups: number): number {
  if (groups <= 0 || groups > length) return 0;
  let result = 1;
  const k = Math.min(groups - 1, length - groups);
  for (let i = 0; i < k; i++) {
    result = (result * (length - 1 - i)) / (i + 1);
  }
  return Math.round(result);
}
