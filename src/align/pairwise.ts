import { diffArrays } from 'diff';

/**
 * Longest-common-subsequence match of `other` against `reference`.
 * Returns, for each reference index, the matched index in `other` or -1.
 */
export function matchAgainstReference(reference: readonly string[], other: readonly string[]): number[] {
  const matchOf = new Array<number>(reference.length).fill(-1);
  let head = 0;
  const limit = Math.min(reference.length, other.length);
  while (head < limit && reference[head] === other[head]) {
    matchOf[head] = head;
    head += 1;
  }
  let tail = 0;
  while (tail < limit - head && reference[reference.length - 1 - tail] === other[other.length - 1 - tail]) {
    matchOf[reference.length - 1 - tail] = other.length - 1 - tail;
    tail += 1;
  }

  const refMid = reference.slice(head, reference.length - tail);
  const otherMid = other.slice(head, other.length - tail);
  if (refMid.length === 0 || otherMid.length === 0) return matchOf;

  let i = head;
  let j = head;
  for (const change of diffArrays(refMid, otherMid)) {
    const count = change.count ?? change.value.length;
    if (change.added) {
      j += count;
    } else if (change.removed) {
      i += count;
    } else {
      for (let k = 0; k < count; k += 1) matchOf[i + k] = j + k;
      i += count;
      j += count;
    }
  }
  return matchOf;
}
