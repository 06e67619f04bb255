/**
 * Compare two keys by Unicode code point.
 *
 * This is the byte order of their UTF-8 encodings. The default sort compares
 * UTF-16 code units, which puts astral characters before U+E000..U+FFFF.
 */
export function compareKeys(left: string, right: string): number {
  if (left === right) return 0;

  const a = left[Symbol.iterator]();
  const b = right[Symbol.iterator]();

  for (;;) {
    const nextA = a.next();
    const nextB = b.next();

    if (nextA.done === true) return nextB.done === true ? 0 : -1;
    if (nextB.done === true) return 1;

    const pointA = nextA.value.codePointAt(0) ?? 0;
    const pointB = nextB.value.codePointAt(0) ?? 0;
    if (pointA !== pointB) return pointA < pointB ? -1 : 1;
  }
}

export function sortKeys(keys: Iterable<string>): string[] {
  return Array.from(keys).sort(compareKeys);
}
