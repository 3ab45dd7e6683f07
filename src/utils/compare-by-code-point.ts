/**
 * Orders strings by Unicode code point, independent of locale. Dimension and
 * model ids are sorted this way so output is identical on every host.
 */
export function compareByCodePoint(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  const leftIterator = left[Symbol.iterator]();
  const rightIterator = right[Symbol.iterator]();

  for (;;) {
    const leftStep = leftIterator.next();
    const rightStep = rightIterator.next();

    if (leftStep.done || rightStep.done) {
      return Number(Boolean(rightStep.done)) - Number(Boolean(leftStep.done));
    }

    const leftCodePoint = leftStep.value.codePointAt(0) ?? 0;
    const rightCodePoint = rightStep.value.codePointAt(0) ?? 0;

    if (leftCodePoint !== rightCodePoint) {
      return leftCodePoint < rightCodePoint ? -1 : 1;
    }
  }
}

export function sortByCodePoint(values: Iterable<string>): string[] {
  return [...values].sort(compareByCodePoint);
}
