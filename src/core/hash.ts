/**
 * 32-bit FNV-1a over UTF-16 code units, rendered as `fnv1a32:<hex>`.
 */
export function fnv1a32(input: string): string {
  let hash = 0x811c9dc5;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  const hex = (hash >>> 0).toString(16).padStart(8, "0");
  return `fnv1a32:${hex}`;
}
