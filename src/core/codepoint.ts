/**
 * Code point and its UTF-16 index metadata.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export interface CodePointInfo {
  codePoint: number;
  indexCU: number;
  sizeCU: number;
}

/**
 * Iterate code points with UTF-16 code unit offsets.
 * Lone surrogates are yielded as their own code point.
 * Units: Unicode scalar values.
 * Units: UTF-16 code units.
 */
export function* iterateCodePoints(text: string): Iterable<CodePointInfo> {
  for (let codeUnitIndex = 0; codeUnitIndex < text.length; ) {
    const codePoint = text.codePointAt(codeUnitIndex) ?? 0;
    const sizeCU = codePoint > 0xffff ? 2 : 1;
    yield { codePoint, indexCU: codeUnitIndex, sizeCU };
    codeUnitIndex += sizeCU;
  }
}

/**
 * Encoded length of a code point in UTF-8.
 * Lone surrogates count as U+FFFD, which is what TextEncoder writes for them.
 * Units: bytes (UTF-8).
 */
export function codePointUtf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * UTF-8 length of a string without encoding it.
 * Units: bytes (UTF-8).
 */
export function utf8Length(text: string): number {
  let total = 0;
  for (const cp of iterateCodePoints(text)) {
    total += codePointUtf8Length(cp.codePoint);
  }
  return total;
}
